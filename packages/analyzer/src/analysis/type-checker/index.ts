export { TypeChecker, createTypeCheckerPass } from "./checker.js";
export { TypingContext } from "./context.js";
export { defineHandlers, type DefineHandler } from "./definitions.js";
export {
  checkArgumentCount,
  checkArgumentsAtLeast,
  checkArgumentsByFunctionType,
} from "./functions.js";
export * from "./natives/index.js";
export {
  MAX_BUFFER_LENGTH,
  MAX_LIST_LENGTH,
  parseFunctionArgs,
  parseTypeSignature,
  type SignatureOptions,
} from "./signatures.js";
export { leastSupertype } from "./supertype.js";
