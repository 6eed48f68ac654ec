export { loadModel, saveModel } from './store.js';
export type { SaveOptions, SaveResult } from './store.js';
export { renderModel, renderCanonical, describesModel, writeToml } from './render.js';
export { TomlDocument, DocumentError } from './document.js';
export type { DocumentBlock, DocumentEntry, KeyPath } from './document.js';
export { parseToml, renderValue, renderKey, renderKeyPath, isTable, tableAt } from './toml.js';
export type { TomlTable, TomlValue } from './toml.js';
