import { describe, expect, test } from "vitest";
import * as AST from "../../src/ast";
import { Interpreter } from "../../src/interpreter";

const int = AST.integerLiteral;
const str = AST.stringLiteral;
const id = AST.identifier;
const add = (l: AST.Expression, r: AST.Expression) => AST.binaryExpression("+", l, r);

function returning(name: string, type: string, value: AST.Expression): AST.FunctionDeclaration {
  return AST.functionDeclaration(name, [], [AST.assignmentStatement("Result", value)], { returnType: type });
}

function pairRecord(): AST.RecordDeclaration {
  return AST.recordDeclaration("TPair", { fields: [AST.fieldDeclaration("A", "Integer"), AST.fieldDeclaration("B", "Integer")] });
}

function pairHelper(): AST.HelperDeclaration {
  return AST.helperDeclaration("TPairHelper", "TPair", {
    isRecordHelper: true,
    methods: [
      returning("GetSum", "Integer", add(id("A"), id("B"))),
      AST.functionDeclaration("Swap", [], [
        AST.varDeclaration("T", "Integer", id("A")),
        AST.assignmentStatement("A", id("B")),
        AST.assignmentStatement("B", id("T")),
      ]),
    ],
    properties: [AST.propertyDeclaration("Sum", "Integer", { read: "GetSum" })],
  });
}

describe("interpreter - helpers on built-in types", () => {
  test("methods see the receiver as Self", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([
      AST.helperDeclaration("TIntHelper", "Integer", {
        methods: [returning("Doubled", "Integer", AST.binaryExpression("*", id("Self"), int(2)))],
      }),
      AST.helperDeclaration("TStrHelper", "String", {
        methods: [
          AST.functionDeclaration("Wrap", [AST.parameter("Mark", "String")], [AST.assignmentStatement("Result", add(add(id("Mark"), id("Self")), id("Mark")))], {
            returnType: "String",
          }),
        ],
      }),
      AST.varDeclaration("x", "Integer", int(21)),
    ]));
    expect(I.evaluate(AST.memberAccessExpression(id("x"), "Doubled"))).toEqual({ kind: "integer", value: 42 });
    expect(I.evaluate(AST.methodCall(id("x"), "Doubled"))).toEqual({ kind: "integer", value: 42 });
    expect(I.evaluate(AST.methodCall(str("hi"), "Wrap", [str("*")]))).toEqual({ kind: "string", value: "*hi*" });
  });

  test("class constants and class variables live in the helper", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([
      AST.helperDeclaration("TIntHelper", "Integer", {
        classConsts: [AST.fieldDeclaration("Scale", "Integer", int(10))],
        classVars: [AST.fieldDeclaration("Calls", "Integer")],
        methods: [
          AST.functionDeclaration("Scaled", [], [
            AST.assignmentStatement("Calls", add(id("Calls"), int(1))),
            AST.assignmentStatement("Result", AST.binaryExpression("*", id("Self"), id("Scale"))),
          ], { returnType: "Integer" }),
        ],
      }),
      AST.varDeclaration("x", "Integer", int(3)),
    ]));
    expect(I.evaluate(AST.methodCall(id("x"), "Scaled"))).toEqual({ kind: "integer", value: 30 });
    expect(I.evaluate(AST.methodCall(int(4), "Scaled"))).toEqual({ kind: "integer", value: 40 });
    expect(I.evaluate(AST.memberAccessExpression(id("x"), "Calls"))).toEqual({ kind: "integer", value: 2 });
    expect(I.evaluate(AST.memberAccessExpression(id("x"), "Scale"))).toEqual({ kind: "integer", value: 10 });
  });

  test("the most recent helper for a type wins", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([
      AST.helperDeclaration("TFirst", "Integer", { methods: [returning("Describe", "String", str("first"))] }),
      AST.helperDeclaration("TSecond", "Integer", { methods: [returning("Describe", "String", str("second"))] }),
    ]));
    expect(I.evaluate(AST.methodCall(int(1), "Describe"))).toEqual({ kind: "string", value: "second" });
  });

  test("calls no helper declares are still errors", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.helperDeclaration("TIntHelper", "Integer", { methods: [returning("Doubled", "Integer", int(0))] }));
    expect(I.evaluate(AST.methodCall(int(5), "Foo"))).toEqual({ kind: "error", message: "cannot call method 'Foo' on Integer" });
  });
});

describe("interpreter - record helpers", () => {
  test("properties read through helper methods", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([
      pairRecord(),
      pairHelper(),
      AST.varDeclaration("p", "TPair"),
      AST.assignmentStatement(AST.memberAccessExpression(id("p"), "A"), int(5)),
      AST.assignmentStatement(AST.memberAccessExpression(id("p"), "B"), int(7)),
    ]));
    expect(I.evaluate(AST.memberAccessExpression(id("p"), "Sum"))).toEqual({ kind: "integer", value: 12 });
  });

  test("mutations of Self are written back to the variable", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([
      pairRecord(),
      pairHelper(),
      AST.varDeclaration("p", "TPair"),
      AST.assignmentStatement(AST.memberAccessExpression(id("p"), "A"), int(1)),
      AST.assignmentStatement(AST.memberAccessExpression(id("p"), "B"), int(2)),
      AST.expressionStatement(AST.methodCall(id("p"), "Swap")),
    ]));
    expect(I.evaluate(AST.memberAccessExpression(id("p"), "A"))).toEqual({ kind: "integer", value: 2 });
    expect(I.evaluate(AST.memberAccessExpression(id("p"), "B"))).toEqual({ kind: "integer", value: 1 });
  });

  test("record helpers cannot extend classes", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.classDeclaration("TThing"));
    expect(I.evaluate(AST.helperDeclaration("TBad", "TThing", { isRecordHelper: true }))).toEqual({
      kind: "error",
      message: "record helper TBad cannot extend TThing",
    });
  });
});

describe("interpreter - class helpers", () => {
  function program(): AST.Program {
    return AST.program([
      AST.classDeclaration("TThing", { methods: [returning("Name", "String", str("CLASS METHOD"))] }),
      AST.classDeclaration("TChild", { parent: "TThing" }),
      AST.helperDeclaration("TThingHelper", "TThing", {
        methods: [returning("Name", "String", str("HELPER")), returning("Extra", "String", str("EXTRA"))],
      }),
      AST.varDeclaration("o", "TThing", AST.methodCall(id("TThing"), "Create")),
      AST.varDeclaration("c", "TChild", AST.methodCall(id("TChild"), "Create")),
    ]);
  }

  test("the class's own methods win over the helper's", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(program());
    expect(I.evaluate(AST.methodCall(id("o"), "Name"))).toEqual({ kind: "string", value: "CLASS METHOD" });
    expect(I.evaluate(AST.methodCall(id("o"), "Extra"))).toEqual({ kind: "string", value: "EXTRA" });
  });

  test("descendants pick up the helper", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(program());
    expect(I.evaluate(AST.methodCall(id("c"), "Extra"))).toEqual({ kind: "string", value: "EXTRA" });
  });

  test("helpers cannot declare constructors", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.classDeclaration("TThing"));
    const bad = AST.helperDeclaration("TBad", "TThing", { methods: [AST.constructorDeclaration("Make", [], [])] });
    expect(I.evaluate(bad)).toEqual({ kind: "error", message: "helper TBad cannot declare constructor Make" });
    expect(I.evaluate(AST.helperDeclaration("TBad", "TThing"))).toEqual({ kind: "nil", value: null });
  });
});
