export type * from "./api.js";
export type * from "./documents.js";
