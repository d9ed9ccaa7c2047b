export * from "./domain/match";
export * from "./domain/pitch";
export * from "./domain/shot";
