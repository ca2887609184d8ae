import { MAX_BOARD_SIZE, MIN_BOARD_SIZE } from "@skirmish/shared";
import { parseDimension } from "./config";
import type { OutputSink } from "./session";

export type Ask = (question: string) => Promise<string>;

export const promptDimension = async (ask: Ask, output: OutputSink, question: string): Promise<number> => {
  for (;;) {
    const value = parseDimension(await ask(question));
    if (value !== null) {
      return value;
    }
    output.write(`Invalid input. Please enter a number between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}.`);
  }
};
