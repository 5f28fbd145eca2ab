/**
 * Command module
 *
 * Operation catalogue, argument quoting and command assembly.
 */

export * from "./command.types";
export { shellQuote } from "./quote";
export { OPERATIONS, isOperationName, getOperation, validateFlags, type OperationName } from "./operations";
export { logChannelKey, isEngineChannel, buildCommand, finalizeCommand, type FinalizeOptions } from "./command";
