import { describe, expect, test } from "vitest";
import * as AST from "../../src/ast";
import { Interpreter } from "../../src/interpreter";

const int = AST.integerLiteral;
const str = AST.stringLiteral;

describe("interpreter - arithmetic", () => {
  test("mixed Integer and Float arithmetic widens to Float", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.binaryExpression("+", int(1), AST.floatLiteral(2.5)))).toEqual({ kind: "float", value: 3.5 });
    expect(I.evaluate(AST.binaryExpression("*", int(6), int(7)))).toEqual({ kind: "integer", value: 42 });
  });

  test("/ always yields Float while div truncates toward zero", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.binaryExpression("/", int(7), int(2)))).toEqual({ kind: "float", value: 3.5 });
    expect(I.evaluate(AST.binaryExpression("div", AST.unaryExpression("-", int(7)), int(2)))).toEqual({ kind: "integer", value: -3 });
    expect(I.evaluate(AST.binaryExpression("mod", int(7), int(3)))).toEqual({ kind: "integer", value: 1 });
  });

  test("bitwise operators on Integer", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.binaryExpression("shl", int(1), int(4)))).toEqual({ kind: "integer", value: 16 });
    expect(I.evaluate(AST.binaryExpression("shr", int(256), int(4)))).toEqual({ kind: "integer", value: 16 });
    expect(I.evaluate(AST.binaryExpression("xor", int(5), int(3)))).toEqual({ kind: "integer", value: 6 });
    expect(I.evaluate(AST.binaryExpression("and", int(6), int(3)))).toEqual({ kind: "integer", value: 2 });
    expect(I.evaluate(AST.unaryExpression("not", int(0)))).toEqual({ kind: "integer", value: -1 });
  });

  test("division by zero raises EDivByZero", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.binaryExpression("/", int(10), int(0)))).toEqual({ kind: "nil", value: null });
    expect(I.exception?.classInfo.name).toBe("EDivByZero");
    expect(I.exception?.message).toBe("Division by zero");

    const J = new Interpreter({ output: () => {} });
    J.evaluate(AST.binaryExpression("mod", int(5), int(0)));
    expect(J.exception?.classInfo.name).toBe("EDivByZero");
  });

  test("not on Integer keeps bits above 32", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.unaryExpression("not", int(4294967296)))).toEqual({ kind: "integer", value: -4294967297 });
    expect(I.evaluate(AST.binaryExpression("and", int(4294967297), int(4294967296)))).toEqual({ kind: "integer", value: 4294967296 });
  });

  test("Integer results outside the exact range raise EIntOverflow", () => {
    const overflows = [
      AST.binaryExpression("shl", int(1), int(64)),
      AST.binaryExpression("*", int(9007199254740991), int(3)),
      AST.binaryExpression("+", int(9007199254740991), int(1)),
      AST.binaryExpression("-", AST.unaryExpression("-", int(9007199254740991)), int(1)),
    ];
    for (const expr of overflows) {
      const I = new Interpreter({ output: () => {} });
      expect(I.evaluate(expr)).toEqual({ kind: "nil", value: null });
      expect(I.exception?.classInfo.name).toBe("EIntOverflow");
      expect(I.exception?.message).toBe("Integer overflow");
    }

    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.binaryExpression("shl", int(1), int(52)))).toEqual({ kind: "integer", value: 4503599627370496 });
    expect(I.evaluate(AST.binaryExpression("div", int(9007199254740991), int(2)))).toEqual({ kind: "integer", value: 4503599627370495 });
    expect(I.evaluate(AST.binaryExpression("shl", int(1), AST.unaryExpression("-", int(1))))).toEqual({ kind: "error", message: "negative shift count -1" });
    expect(I.exception).toBeNull();
  });

  test("integer literals beyond the exact range are rejected", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.binaryExpression("=", int(2 ** 53 + 1), int(2 ** 53)))).toEqual({
      kind: "error",
      message: "integer literal 9007199254740992 out of range",
    });
  });

  test("operators reject mismatched operands", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.binaryExpression("-", str("a"), int(1)))).toEqual({
      kind: "error",
      message: "operator - not applicable to String and Integer",
    });
    expect(I.evaluate(AST.at(AST.unaryExpression("-", str("a")), 2, 7))).toEqual({
      kind: "error",
      message: "operator - not applicable to String at line 2, column 7",
    });
  });
});

describe("interpreter - strings and comparisons", () => {
  test("string concatenation and substring membership", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.binaryExpression("+", str("ab"), str("cd")))).toEqual({ kind: "string", value: "abcd" });
    expect(I.evaluate(AST.binaryExpression("in", str("ell"), str("hello")))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression("in", str("xyz"), str("hello")))).toEqual({ kind: "boolean", value: false });
  });

  test("relational operators over strings, numbers and booleans", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.binaryExpression("<", str("apple"), str("banana")))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression("=", int(1), AST.floatLiteral(1)))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression(">", AST.booleanLiteral(true), AST.booleanLiteral(false)))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression("<>", int(3), int(3)))).toEqual({ kind: "boolean", value: false });
  });

  test("membership in an array literal", () => {
    const I = new Interpreter({ output: () => {} });
    const arr = AST.arrayLiteral([int(1), int(2), int(3)]);
    expect(I.evaluate(AST.binaryExpression("in", int(2), arr))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression("in", int(9), arr))).toEqual({ kind: "boolean", value: false });
  });
});

describe("interpreter - boolean logic", () => {
  test("and / or short-circuit the right operand", () => {
    const I = new Interpreter({ output: () => {} });
    const boom = AST.binaryExpression("=", AST.binaryExpression("div", int(1), int(0)), int(0));
    expect(I.evaluate(AST.binaryExpression("and", AST.booleanLiteral(false), boom))).toEqual({ kind: "boolean", value: false });
    expect(I.evaluate(AST.binaryExpression("or", AST.booleanLiteral(true), boom))).toEqual({ kind: "boolean", value: true });
    expect(I.exception).toBeNull();
  });

  test("not and xor on booleans", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.unaryExpression("not", AST.booleanLiteral(true)))).toEqual({ kind: "boolean", value: false });
    expect(I.evaluate(AST.binaryExpression("xor", AST.booleanLiteral(true), AST.booleanLiteral(false)))).toEqual({ kind: "boolean", value: true });
  });
});

describe("interpreter - variables", () => {
  test("Variant slots box their value and unwrap for arithmetic", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.varDeclaration("v", "Variant", int(5)));
    expect(I.evaluate(AST.identifier("v"))).toEqual({ kind: "variant", value: { kind: "integer", value: 5 } });
    expect(I.evaluate(AST.binaryExpression("+", AST.identifier("V"), int(1)))).toEqual({ kind: "integer", value: 6 });
  });

  test("compound assignment and case-insensitive names", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.varDeclaration("Total", "Integer", int(10)));
    I.evaluate(AST.assignmentStatement("TOTAL", int(5), "+="));
    I.evaluate(AST.assignmentStatement("total", int(3), "*="));
    expect(I.evaluate(AST.identifier("Total"))).toEqual({ kind: "integer", value: 45 });
  });

  test("constants cannot be reassigned", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.constDeclaration("Limit", int(3)));
    expect(I.evaluate(AST.assignmentStatement("Limit", int(4)))).toEqual({ kind: "error", message: "cannot assign to constant Limit" });
  });

  test("redeclaring a variable in the same scope fails", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.varDeclaration("x", "Integer"));
    expect(I.evaluate(AST.varDeclaration("x", "String"))).toEqual({ kind: "error", message: "variable x already declared" });
  });

  test("unknown identifiers report their name", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.at(AST.identifier("missing"), 1, 4))).toEqual({
      kind: "error",
      message: "undefined identifier: missing at line 1, column 4",
    });
  });
});
