export type * from "./types/scrape.js";
export type * from "./types/engine.js";
