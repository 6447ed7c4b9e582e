export { calculate, evaluate, formatResult } from "./evaluator";
export { tokenize } from "./tokenizer";
export { parse } from "./parser";
export { FUNCTIONS } from "./functions";
export { CalcError, type CalcErrorCode, type ASTNode, type Token } from "./types";
