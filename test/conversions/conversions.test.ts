import { describe, expect, test } from "vitest";
import * as AST from "../../src/ast";
import { Interpreter } from "../../src/interpreter";

const int = AST.integerLiteral;
const str = AST.stringLiteral;
const id = AST.identifier;
const degrees = (object: string) => AST.memberAccessExpression(id(object), "Degrees");

function temperatures(): AST.Statement[] {
  const degreesRecord = (name: string) => AST.recordDeclaration(name, { fields: [AST.fieldDeclaration("Degrees", "Integer")] });
  return [
    degreesRecord("TCelsius"),
    degreesRecord("TKelvin"),
    AST.functionDeclaration("IntToCelsius", [AST.parameter("V", "Integer")], [AST.assignmentStatement(degrees("Result"), id("V"))], {
      returnType: "TCelsius",
    }),
    AST.functionDeclaration(
      "CelsiusToKelvin",
      [AST.parameter("C", "TCelsius")],
      [AST.assignmentStatement(degrees("Result"), AST.binaryExpression("+", degrees("C"), int(273)))],
      { returnType: "TKelvin" },
    ),
    AST.functionDeclaration("CelsiusToInt", [AST.parameter("C", "TCelsius")], [AST.assignmentStatement("Result", degrees("C"))], {
      returnType: "Integer",
    }),
    AST.operatorDeclaration("implicit", ["Integer"], "IntToCelsius", "TCelsius"),
    AST.operatorDeclaration("implicit", ["TCelsius"], "CelsiusToKelvin", "TKelvin"),
    AST.operatorDeclaration("explicit", ["TCelsius"], "CelsiusToInt", "Integer"),
  ];
}

describe("interpreter - assignment compatibility", () => {
  test("integers widen to Float", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.varDeclaration("f", "Float", int(3)));
    expect(I.evaluate(id("f"))).toEqual({ kind: "float", value: 3 });
  });

  test("mismatched values are rejected", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.varDeclaration("i", "Integer", str("x")))).toEqual({
      kind: "error",
      message: "incompatible types: cannot assign String to Integer",
    });
    expect(I.evaluate(AST.varDeclaration("j", "Integer", AST.nilLiteral()))).toEqual({
      kind: "error",
      message: "cannot assign nil to Integer",
    });
  });
});

describe("interpreter - type casts", () => {
  test("primitive casts", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.functionCall("Integer", [AST.floatLiteral(3.7)]))).toEqual({ kind: "integer", value: 3 });
    expect(I.evaluate(AST.functionCall("String", [int(42)]))).toEqual({ kind: "string", value: "42" });
    expect(I.evaluate(AST.functionCall("Boolean", [int(0)]))).toEqual({ kind: "boolean", value: false });
    expect(I.evaluate(AST.typeCastExpression("Float", int(2)))).toEqual({ kind: "float", value: 2 });
    expect(I.evaluate(AST.functionCall("Integer", [str("abc")]))).toEqual({ kind: "error", message: "cannot cast String to Integer" });
  });

  test("integers cast to enum members by ordinal", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.enumDeclaration("TColor", ["Red", "Green", "Blue"]));
    expect(I.evaluate(AST.functionCall("TColor", [int(1)]))).toMatchObject({ kind: "enum", name: "Green", ordinal: 1 });
    expect(I.evaluate(AST.functionCall("Integer", [id("Blue")]))).toEqual({ kind: "integer", value: 2 });
    expect(I.evaluate(AST.functionCall("TColor", [int(7)]))).toEqual({ kind: "error", message: "enum ordinal 7 out of range for TColor" });
  });

  test("a cast takes exactly one argument", () => {
    const I = new Interpreter({ output: () => {} });
    expect(I.evaluate(AST.functionCall("Integer", [int(1), int(2)]))).toEqual({
      kind: "error",
      message: "type cast to Integer takes exactly one argument",
    });
  });
});

describe("interpreter - conversion operators", () => {
  test("implicit conversions chain", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([...temperatures(), AST.varDeclaration("k", "TKelvin", int(25))]));
    expect(I.evaluate(degrees("k"))).toEqual({ kind: "integer", value: 298 });
  });

  test("parameters accept implicitly convertible arguments", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([
      ...temperatures(),
      AST.functionDeclaration(
        "Show",
        [AST.parameter("T", "TCelsius")],
        [AST.assignmentStatement("Result", AST.functionCall("IntToStr", [degrees("T")]))],
        { returnType: "String" },
      ),
    ]));
    expect(I.evaluate(AST.functionCall("Show", [int(5)]))).toEqual({ kind: "string", value: "5" });
  });

  test("explicit conversions only apply to casts", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([
      ...temperatures(),
      AST.varDeclaration("c", "TCelsius", AST.recordLiteral(undefined, [AST.recordFieldInitializer("Degrees", int(40))])),
    ]));
    expect(I.evaluate(AST.functionCall("Integer", [id("c")]))).toEqual({ kind: "integer", value: 40 });
    expect(I.evaluate(AST.varDeclaration("n", "Integer", id("c")))).toEqual({
      kind: "error",
      message: "incompatible types: cannot assign TCelsius to Integer",
    });
  });

  test("chains stop after three steps", () => {
    const I = new Interpreter({ output: () => {} });
    const v = (object: string) => AST.memberAccessExpression(id(object), "V");
    const names = ["TA", "TB", "TC", "TD"];
    const decls: AST.Statement[] = names.map((name) => AST.recordDeclaration(name, { fields: [AST.fieldDeclaration("V", "Integer")] }));
    decls.push(
      AST.functionDeclaration("MakeA", [AST.parameter("N", "Integer")], [AST.assignmentStatement(v("Result"), id("N"))], { returnType: "TA" }),
      AST.operatorDeclaration("implicit", ["Integer"], "MakeA", "TA"),
    );
    for (const [i, from] of names.slice(0, -1).entries()) {
      const to = names[i + 1] ?? "";
      const fn = `${from}To${to}`;
      decls.push(
        AST.functionDeclaration(fn, [AST.parameter("X", from)], [AST.assignmentStatement(v("Result"), AST.binaryExpression("+", v("X"), int(1)))], {
          returnType: to,
        }),
        AST.operatorDeclaration("implicit", [from], fn, to),
      );
    }
    I.evaluate(AST.program([...decls, AST.varDeclaration("c", "TC", int(1))]));
    expect(I.evaluate(v("c"))).toEqual({ kind: "integer", value: 3 });
    expect(I.evaluate(AST.varDeclaration("d", "TD", int(1)))).toEqual({
      kind: "error",
      message: "incompatible types: cannot assign Integer to TD",
    });
  });

  test("a conversion between two types is declared once", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program(temperatures()));
    expect(I.evaluate(AST.operatorDeclaration("implicit", ["Integer"], "IntToCelsius", "TCelsius"))).toEqual({
      kind: "error",
      message: "implicit conversion from Integer to TCelsius already defined",
    });
  });
});
