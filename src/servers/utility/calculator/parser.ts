import { CalcError, type ASTNode, type Token, type TokenType } from "./types";

/*
 * expr    := term (("+" | "-") term)*
 * term    := unary (("*" | "/") unary)*
 * unary   := ("+" | "-") unary | power
 * power   := primary ("**" unary)?
 * primary := NUMBER | IDENT "(" [expr ("," expr)*] ")" | "(" expr ")"
 *
 * `**` is right-associative and binds tighter than unary minus: -2 ** 2 = -4.
 */
export function parse(tokens: Token[]): ASTNode {
  let pos = 0;
  const last = tokens[tokens.length - 1];
  const eof: Token = last && last.type === "EOF" ? last : { type: "EOF", value: "", pos: 0 };

  function peek(): Token {
    return tokens[pos] ?? eof;
  }

  function advance(): Token {
    const tok = peek();
    pos++;
    return tok;
  }

  function expect(type: TokenType): Token {
    const tok = peek();
    if (tok.type !== type) {
      throw new CalcError(
        `Expected '${type}' but got '${tok.value || tok.type}'`,
        tok.pos,
        type === "RPAREN" ? "UNCLOSED_PAREN" : "UNEXPECTED_TOKEN",
      );
    }
    return advance();
  }

  function parseExpr(): ASTNode {
    let left = parseTerm();
    for (;;) {
      const tok = peek();
      if (tok.type === "PLUS" || tok.type === "MINUS") {
        advance();
        left = { kind: "binary", op: tok.type === "PLUS" ? "+" : "-", left, right: parseTerm(), pos: tok.pos };
      } else {
        return left;
      }
    }
  }

  function parseTerm(): ASTNode {
    let left = parseUnary();
    for (;;) {
      const tok = peek();
      if (tok.type === "STAR" || tok.type === "SLASH") {
        advance();
        left = { kind: "binary", op: tok.type === "STAR" ? "*" : "/", left, right: parseUnary(), pos: tok.pos };
      } else {
        return left;
      }
    }
  }

  function parseUnary(): ASTNode {
    const tok = peek();
    if (tok.type === "PLUS" || tok.type === "MINUS") {
      advance();
      return { kind: "unary", op: tok.type === "PLUS" ? "+" : "-", operand: parseUnary(), pos: tok.pos };
    }
    return parsePower();
  }

  function parsePower(): ASTNode {
    const base = parsePrimary();
    const tok = peek();
    if (tok.type === "POW") {
      advance();
      return { kind: "binary", op: "**", left: base, right: parseUnary(), pos: tok.pos };
    }
    return base;
  }

  function parseCall(nameTok: Token): ASTNode {
    advance(); // (
    const args: ASTNode[] = [];

    if (peek().type !== "RPAREN") {
      args.push(parseExpr());
      while (peek().type === "COMMA") {
        advance();
        args.push(parseExpr());
      }
    }

    expect("RPAREN");
    return { kind: "call", name: nameTok.value, args, pos: nameTok.pos };
  }

  function parsePrimary(): ASTNode {
    const tok = advance();
    switch (tok.type) {
      case "NUMBER":
        return { kind: "number", value: tok.value, pos: tok.pos };

      case "IDENT":
        if (peek().type === "LPAREN") {
          return parseCall(tok);
        }
        throw new CalcError(`Unknown name: ${tok.value}`, tok.pos, "UNKNOWN_NAME");

      case "LPAREN": {
        const expr = parseExpr();
        expect("RPAREN");
        return expr;
      }

      case "EOF":
        throw new CalcError("Unexpected end of expression", tok.pos, "UNEXPECTED_TOKEN");

      default:
        throw new CalcError(`Unexpected token: '${tok.value}'`, tok.pos, "UNEXPECTED_TOKEN");
    }
  }

  if (peek().type === "EOF") {
    throw new CalcError("Empty expression", 0, "EMPTY_EXPRESSION");
  }

  const result = parseExpr();

  if (peek().type !== "EOF") {
    const tok = peek();
    throw new CalcError(`Unexpected token: '${tok.value}'`, tok.pos, "UNEXPECTED_TOKEN");
  }

  return result;
}
