import { describe, expect, test } from "vitest";
import * as AST from "../../src/ast";
import { Interpreter } from "../../src/interpreter";

const int = AST.integerLiteral;
const str = AST.stringLiteral;
const id = AST.identifier;
const call = AST.functionCall;
const print = (arg: AST.Expression) => AST.expressionStatement(call("PrintLn", [arg]));
const colors = (...names: string[]) => AST.setLiteral(names.map((n) => id(n)));

function capture(): { I: Interpreter; out: string[] } {
  const out: string[] = [];
  return { I: new Interpreter({ output: (text) => out.push(text) }), out };
}

function withColors(I: Interpreter, ...rest: AST.Statement[]): void {
  I.evaluate(AST.program([
    AST.enumDeclaration("TColor", ["Red", "Green", "Blue"]),
    AST.varDeclaration("s", AST.setTypeExpression("TColor"), AST.arrayLiteral([id("Red"), id("Green")])),
    AST.varDeclaration("t", AST.setTypeExpression("TColor"), colors("Green", "Blue")),
    ...rest,
  ]));
}

describe("interpreter - set literals", () => {
  test("ranges expand and sets print in ordinal order", () => {
    const { I, out } = capture();
    withColors(
      I,
      AST.varDeclaration("all", undefined, AST.setLiteral([AST.rangeExpression(id("Red"), id("Blue"))])),
      AST.varDeclaration("none", AST.setTypeExpression("TColor")),
      print(id("all")),
      print(id("none")),
      print(colors("Blue", "Red")),
    );
    expect(out).toEqual(["[Red, Green, Blue]\n", "[]\n", "[Red, Blue]\n"]);
  });

  test("character ranges", () => {
    const { I, out } = capture();
    I.evaluate(AST.program([
      AST.varDeclaration("letters", undefined, AST.setLiteral([AST.rangeExpression(str("a"), str("c"))])),
      print(id("letters")),
    ]));
    expect(out).toEqual(["[a, b, c]\n"]);
    expect(I.evaluate(AST.binaryExpression("in", str("b"), id("letters")))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression("in", str("z"), id("letters")))).toEqual({ kind: "boolean", value: false });
  });

  test("literals need an ordinal element type", () => {
    const { I } = capture();
    withColors(I);
    expect(I.evaluate(AST.setLiteral([]))).toEqual({ kind: "error", message: "cannot infer type for empty set literal" });
    expect(I.evaluate(AST.setLiteral([AST.floatLiteral(1.5)]))).toEqual({
      kind: "error",
      message: "set element type must be ordinal, got Float",
    });
    expect(I.evaluate(AST.setLiteral([id("Red"), int(1)]))).toEqual({
      kind: "error",
      message: "type mismatch in set literal: expected TColor, got Integer",
    });
    expect(I.evaluate(AST.setLiteral([int(70000)]))).toEqual({ kind: "error", message: "set element 70000 out of range 0..65535" });
  });
});

describe("interpreter - set operators", () => {
  test("union, difference and intersection", () => {
    const { I, out } = capture();
    withColors(
      I,
      print(AST.binaryExpression("+", id("s"), id("t"))),
      print(AST.binaryExpression("-", id("s"), id("t"))),
      print(AST.binaryExpression("*", id("s"), id("t"))),
      print(AST.binaryExpression("+", id("s"), AST.arrayLiteral([id("Blue")]))),
    );
    expect(out).toEqual(["[Red, Green, Blue]\n", "[Red]\n", "[Green]\n", "[Red, Green, Blue]\n"]);
  });

  test("membership and comparisons", () => {
    const { I } = capture();
    withColors(I);
    expect(I.evaluate(AST.binaryExpression("in", id("Red"), id("s")))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression("in", id("Blue"), id("s")))).toEqual({ kind: "boolean", value: false });
    expect(I.evaluate(AST.binaryExpression("=", id("s"), AST.arrayLiteral([id("Green"), id("Red")])))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression("<>", id("s"), id("t")))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression("<=", colors("Red"), id("s")))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression(">=", id("s"), id("t")))).toEqual({ kind: "boolean", value: false });
  });

  test("operands must share the element type", () => {
    const { I } = capture();
    withColors(I, AST.varDeclaration("n", undefined, AST.setLiteral([int(1)])));
    expect(I.evaluate(AST.binaryExpression("in", int(1), id("s")))).toEqual({
      kind: "error",
      message: "type mismatch: Integer not in set of TColor",
    });
    expect(I.evaluate(AST.binaryExpression("+", id("s"), id("n")))).toEqual({
      kind: "error",
      message: "type mismatch in set operation: set of TColor vs set of Integer",
    });
    expect(I.evaluate(AST.binaryExpression("<", id("s"), id("t")))).toEqual({
      kind: "error",
      message: "operator < not applicable to set of TColor",
    });
  });
});

describe("interpreter - set updates", () => {
  test("Include and Exclude as routines and as methods", () => {
    const { I, out } = capture();
    withColors(
      I,
      AST.expressionStatement(call("Include", [id("s"), id("Blue")])),
      AST.expressionStatement(AST.methodCall(id("s"), "Exclude", [id("Red")])),
      AST.expressionStatement(AST.methodCall(id("t"), "Include", [id("Red")])),
      print(id("s")),
      print(id("t")),
    );
    expect(out).toEqual(["[Green, Blue]\n", "[Red, Green, Blue]\n"]);
  });

  test("assignment copies the set", () => {
    const { I, out } = capture();
    withColors(
      I,
      AST.varDeclaration("u", AST.setTypeExpression("TColor"), id("s")),
      AST.expressionStatement(call("Include", [id("u"), id("Blue")])),
      print(id("s")),
      print(id("u")),
    );
    expect(out).toEqual(["[Red, Green]\n", "[Red, Green, Blue]\n"]);
  });

  test("updates check the element type", () => {
    const { I } = capture();
    withColors(I, AST.varDeclaration("n", undefined, AST.setLiteral([int(1)])));
    expect(I.evaluate(call("Include", [id("n"), id("Red")]))).toEqual({
      kind: "error",
      message: "type mismatch: cannot add TColor to set of Integer",
    });
    expect(I.evaluate(AST.methodCall(id("s"), "Exclude", [int(2)]))).toEqual({
      kind: "error",
      message: "type mismatch: cannot remove Integer from set of TColor",
    });
  });
});

describe("interpreter - set iteration and serialization", () => {
  test("for-in visits members in ordinal order", () => {
    const { I, out } = capture();
    withColors(
      I,
      AST.varDeclaration("mixed", AST.setTypeExpression("TColor"), colors("Blue", "Red")),
      AST.forInStatement("c", id("mixed"), print(id("c")), true),
    );
    expect(out).toEqual(["Red\n", "Blue\n"]);
  });

  test("JSONStringify writes sets as arrays", () => {
    const { I } = capture();
    withColors(I);
    expect(I.evaluate(call("JSONStringify", [id("t")]))).toEqual({ kind: "string", value: '["Green","Blue"]' });
    expect(I.evaluate(call("JSONStringify", [AST.setLiteral([int(3), int(1)])]))).toEqual({ kind: "string", value: "[1,3]" });
  });
});
