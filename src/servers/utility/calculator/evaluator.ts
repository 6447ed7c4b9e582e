import { CalcDecimal, callFunction, power, type Dec } from "./functions";
import { parse } from "./parser";
import { tokenize } from "./tokenizer";
import { CalcError, type ASTNode } from "./types";

export function evaluate(node: ASTNode): Dec {
  switch (node.kind) {
    case "number":
      return new CalcDecimal(node.value);

    case "unary":
      if (node.op === "+") return evaluate(node.operand);
      return evaluate(node.operand).negated();

    case "binary": {
      const left = evaluate(node.left);
      const right = evaluate(node.right);
      switch (node.op) {
        case "+": return left.plus(right);
        case "-": return left.minus(right);
        case "*": return left.times(right);
        case "/": {
          if (right.isZero()) {
            throw new CalcError("Division by zero", node.pos, "DIVISION_BY_ZERO");
          }
          return left.dividedBy(right);
        }
        case "**": return power(left, right, node.pos);
      }
      break;
    }

    case "call": {
      const args = node.args.map((a) => evaluate(a));
      return callFunction(node.name, args, node.pos);
    }
  }

  throw new CalcError("Evaluation error", 0, "UNEXPECTED_TOKEN");
}

export function formatResult(d: Dec): string {
  if (d.isZero()) return "0";
  if (d.isInteger()) return d.toFixed(0);
  return d.toString();
}

export function calculate(expression: string): string {
  const tokens = tokenize(expression);
  const ast = parse(tokens);
  const result = evaluate(ast);
  return formatResult(result);
}
