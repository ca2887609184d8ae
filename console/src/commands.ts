import { z } from "zod";

const anyArgs = z.array(z.string());

const commandSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("help"),
    args: anyArgs
  }),
  z.object({
    type: z.literal("exit"),
    args: anyArgs
  }),
  z.object({
    type: z.literal("restart"),
    args: anyArgs
  }),
  z.object({
    type: z.literal("select"),
    args: z.tuple([z.string().min(1)])
  }),
  z.object({
    type: z.literal("move"),
    args: z.tuple([z.string().min(1), z.string().min(1)])
  })
] as const);

export type Command = z.infer<typeof commandSchema>;
export type CommandName = Command["type"];

export type ParsedLine =
  | {
      ok: true;
      /** null for a blank line */
      command: Command | null;
    }
  | {
      ok: false;
      messages: string[];
    };

export const HELP_LINES: readonly string[] = [
  "Available commands:",
  "  move <from> <to>    Move a piece (e.g. move B1 C3)",
  "  select <square>     Highlight piece (e.g. select B1)",
  "  restart             Restart the match",
  "  exit                Exit the game",
  "  help                Show this list"
];

const USAGE: Partial<Record<CommandName, readonly string[]>> = {
  select: [
    "Invalid input: The 'select' command takes only one coordinate.",
    "Usage: select <square>",
    "Example: select C1"
  ],
  move: [
    "Invalid input: The 'move' command requires <from> and <to> coordinates.",
    "Usage: move <from_square> <to_square>",
    "Example: move B1 C3"
  ]
};

const isCommandName = (value: string): value is CommandName =>
  ["help", "exit", "restart", "select", "move"].includes(value);

export const parseCommand = (line: string): ParsedLine => {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) {
    return { ok: true, command: null };
  }

  const keyword = tokens[0].toLowerCase();
  const parseResult = commandSchema.safeParse({ type: keyword, args: tokens.slice(1) });
  if (parseResult.success) {
    return { ok: true, command: parseResult.data };
  }

  const usage = isCommandName(keyword) ? USAGE[keyword] : undefined;
  if (usage) {
    return { ok: false, messages: [...usage] };
  }
  return {
    ok: false,
    messages: [`Unknown command: ${keyword}`, 'Type "help" to see a list of valid commands.']
  };
};
