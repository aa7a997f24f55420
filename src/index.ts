export * from "./runedit";
