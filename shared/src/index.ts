export * from "./types";
export * from "./game/constants";
export * from "./game/board";
export * from "./game/move";
export * from "./game/notation";
export * from "./game/state";
