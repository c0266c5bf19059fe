// Re-export convenient top-level helpers from the engine package so the CLI
// package can expose a single entrypoint for tools and scripts.
export { readModuleFile, readInstrumentFile, getModuleSummary, exportJSON } from '@furcodec/engine';
export { buildProgram, describeInstrument } from './program.js';
