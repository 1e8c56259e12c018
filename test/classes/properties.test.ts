import { describe, expect, test } from "vitest";
import * as AST from "../../src/ast";
import { Interpreter } from "../../src/interpreter";

const int = AST.integerLiteral;
const id = AST.identifier;

function counterClass(): AST.ClassDeclaration {
  return AST.classDeclaration("TCounter", {
    fields: [AST.fieldDeclaration("FValue", "Integer")],
    methods: [
      AST.functionDeclaration(
        "SetValue",
        [AST.parameter("V", "Integer")],
        [AST.assignmentStatement("FValue", AST.binaryExpression("*", id("V"), int(2)))],
      ),
      AST.functionDeclaration("GetDoubled", [], [AST.assignmentStatement("Result", AST.binaryExpression("*", id("FValue"), int(2)))], {
        returnType: "Integer",
      }),
    ],
    properties: [
      AST.propertyDeclaration("Value", "Integer", { read: "FValue", write: "SetValue" }),
      AST.propertyDeclaration("Doubled", "Integer", { read: "GetDoubled" }),
    ],
  });
}

function listClass(): AST.ClassDeclaration {
  return AST.classDeclaration("TList", {
    fields: [AST.fieldDeclaration("FItems", AST.dynamicArrayType("Integer"))],
    methods: [
      AST.constructorDeclaration("Create", [], [AST.assignmentStatement("FItems", AST.arrayLiteral([int(10), int(20), int(30)]))]),
      AST.functionDeclaration(
        "GetItem",
        [AST.parameter("I", "Integer")],
        [AST.assignmentStatement("Result", AST.indexExpression(id("FItems"), id("I")))],
        { returnType: "Integer" },
      ),
      AST.functionDeclaration(
        "SetItem",
        [AST.parameter("I", "Integer"), AST.parameter("V", "Integer")],
        [AST.assignmentStatement(AST.indexExpression(id("FItems"), id("I")), id("V"))],
      ),
    ],
    properties: [
      AST.propertyDeclaration("Items", "Integer", {
        read: "GetItem",
        write: "SetItem",
        indexParams: [AST.parameter("I", "Integer")],
        isDefault: true,
      }),
    ],
  });
}

describe("interpreter - properties", () => {
  test("field reads and method writes", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([
      counterClass(),
      AST.varDeclaration("c", "TCounter", AST.methodCall(id("TCounter"), "Create")),
      AST.assignmentStatement(AST.memberAccessExpression(id("c"), "Value"), int(5)),
    ]));
    expect(I.evaluate(AST.memberAccessExpression(id("c"), "Value"))).toEqual({ kind: "integer", value: 10 });
    expect(I.evaluate(AST.memberAccessExpression(id("c"), "Doubled"))).toEqual({ kind: "integer", value: 20 });
  });

  test("properties without a write accessor are read-only", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([counterClass(), AST.varDeclaration("c", "TCounter", AST.methodCall(id("TCounter"), "Create"))]));
    expect(I.evaluate(AST.assignmentStatement(AST.memberAccessExpression(id("c"), "Doubled"), int(1)))).toEqual({
      kind: "error",
      message: "property Doubled is read-only",
    });
  });

  test("accessors must exist on the class", () => {
    const I = new Interpreter({ output: () => {} });
    const decl = AST.classDeclaration("TBroken", {
      properties: [AST.propertyDeclaration("Size", "Integer", { read: "FSize" })],
    });
    expect(I.evaluate(decl)).toEqual({ kind: "error", message: "read accessor FSize of property TBroken.Size not found" });
  });

  test("default indexed property backs obj[i]", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([listClass(), AST.varDeclaration("L", "TList", AST.methodCall(id("TList"), "Create"))]));
    expect(I.evaluate(AST.indexExpression(id("L"), int(1)))).toEqual({ kind: "integer", value: 20 });

    I.evaluate(AST.assignmentStatement(AST.indexExpression(id("L"), int(1)), int(99)));
    expect(I.evaluate(AST.indexExpression(id("L"), int(1)))).toEqual({ kind: "integer", value: 99 });
    expect(I.evaluate(AST.indexExpression(AST.memberAccessExpression(id("L"), "Items"), int(2)))).toEqual({ kind: "integer", value: 30 });
  });

  test("indexed properties need an index when read by name", () => {
    const I = new Interpreter({ output: () => {} });
    I.evaluate(AST.program([listClass(), AST.varDeclaration("L", "TList", AST.methodCall(id("TList"), "Create"))]));
    expect(I.evaluate(AST.memberAccessExpression(id("L"), "Items"))).toEqual({
      kind: "error",
      message: "indexed property Items requires an index",
    });
  });

  test("multi-index properties pass indices to the getter in order", () => {
    const I = new Interpreter({ output: () => {} });
    const grid = AST.classDeclaration("TGrid", {
      methods: [
        AST.functionDeclaration(
          "GetCell",
          [AST.parameter("R", "Integer"), AST.parameter("C", "Integer")],
          [AST.assignmentStatement("Result", AST.binaryExpression("+", AST.binaryExpression("*", id("R"), int(10)), id("C")))],
          { returnType: "Integer" },
        ),
      ],
      properties: [
        AST.propertyDeclaration("Cells", "Integer", {
          read: "GetCell",
          indexParams: [AST.parameter("R", "Integer"), AST.parameter("C", "Integer")],
        }),
      ],
    });
    I.evaluate(AST.program([grid, AST.varDeclaration("g", "TGrid", AST.methodCall(id("TGrid"), "Create"))]));
    expect(I.evaluate(AST.multiIndexExpression(AST.memberAccessExpression(id("g"), "Cells"), [int(2), int(3)]))).toEqual({
      kind: "integer",
      value: 23,
    });
    expect(I.evaluate(AST.indexExpression(AST.memberAccessExpression(id("g"), "Cells"), int(2)))).toEqual({
      kind: "error",
      message: "property Cells expects 2 index arguments, got 1",
    });
  });
});
