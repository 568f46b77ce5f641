// ipp-parse - IPPcode to XML translator

// Parsing pipeline
export * from './parser/errors.js';
export * from './parser/signatures.js';
export * from './parser/operand.js';
export * from './parser/lexer.js';
export * from './parser/preprocessor.js';
export * from './parser/parser.js';
export * from './parser/program.js';

// XML output
export { renderProgram, renderInstruction, renderOperand } from './xml/renderer.js';

// Configuration and CLI
export { resolveConfig, ConfigError, LANGUAGE_ENV, type ParserConfig } from './config.js';
export { main as runCli, EXIT_CODES, EXIT_SUCCESS, type CliIO } from './cli.js';
