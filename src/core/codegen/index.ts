// src/core/codegen/index.ts

export { Scope } from "./scope";
export { Emitter, DEFAULT_EMITTER_OPTIONS, type EmitterOptions } from "./emitter";
