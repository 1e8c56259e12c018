import { describe, expect, test } from "vitest";
import * as AST from "../../src/ast";
import { Interpreter } from "../../src/interpreter";

const int = AST.integerLiteral;
const id = AST.identifier;

function capture(): { I: Interpreter; out: string[] } {
  const out: string[] = [];
  return { I: new Interpreter({ output: (text) => out.push(text) }), out };
}

describe("interpreter - loops", () => {
  test("while with continue skips the rest of the body", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.varDeclaration("i", "Integer", int(0)),
      AST.varDeclaration("sum", "Integer", int(0)),
      AST.whileStatement(
        AST.binaryExpression("<", id("i"), int(5)),
        AST.blockStatement([
          AST.assignmentStatement("i", int(1), "+="),
          AST.ifStatement(AST.binaryExpression("=", id("i"), int(3)), AST.continueStatement()),
          AST.assignmentStatement("sum", id("i"), "+="),
        ]),
      ),
    ]));
    expect(I.evaluate(id("sum"))).toEqual({ kind: "integer", value: 12 });
  });

  test("repeat runs the body before checking the condition", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.varDeclaration("n", undefined, int(0)),
      AST.repeatStatement(
        [AST.assignmentStatement("n", int(2), "+=")],
        AST.binaryExpression(">=", id("n"), int(7)),
      ),
    ]));
    expect(I.evaluate(id("n"))).toEqual({ kind: "integer", value: 8 });
  });

  test("for with break stops at the first match", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.varDeclaration("last", "Integer", int(0)),
      AST.forStatement(
        "i",
        int(1),
        int(10),
        AST.blockStatement([
          AST.ifStatement(AST.binaryExpression(">", id("i"), int(4)), AST.breakStatement()),
          AST.assignmentStatement("last", id("i")),
        ]),
        { declaresVariable: true },
      ),
    ]));
    expect(I.evaluate(id("last"))).toEqual({ kind: "integer", value: 4 });
  });

  test("downto with a step", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.varDeclaration("sum", "Integer", int(0)),
      AST.forStatement("i", int(10), int(1), AST.assignmentStatement("sum", id("i"), "+="), {
        direction: "downto",
        step: int(3),
        declaresVariable: true,
      }),
    ]));
    expect(I.evaluate(id("sum"))).toEqual({ kind: "integer", value: 22 });
  });

  test("for over an enum range", () => {
    const { I, out } = capture();
    I.evaluate(AST.program([
      AST.enumDeclaration("TColor", ["Red", "Green", "Blue"]),
      AST.forStatement("c", id("Red"), id("Blue"), AST.expressionStatement(AST.functionCall("PrintLn", [id("c")])), {
        declaresVariable: true,
      }),
    ]));
    expect(out.join("")).toBe("Red\nGreen\nBlue\n");
  });

  test("for-in over strings and arrays", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.varDeclaration("s", "String", AST.stringLiteral("")),
      AST.forInStatement("ch", AST.stringLiteral("abc"), AST.assignmentStatement("s", AST.binaryExpression("+", id("ch"), id("s"))), true),
      AST.varDeclaration("total", "Integer", int(0)),
      AST.forInStatement("x", AST.arrayLiteral([int(4), int(5), int(6)]), AST.assignmentStatement("total", id("x"), "+="), true),
    ]));
    expect(I.evaluate(id("s"))).toEqual({ kind: "string", value: "cba" });
    expect(I.evaluate(id("total"))).toEqual({ kind: "integer", value: 15 });
  });

  test("for bounds must be ordinal", () => {
    const { I } = capture();
    const loop = AST.forStatement("i", AST.stringLiteral("a"), int(2), AST.breakStatement(), { declaresVariable: true });
    expect(I.evaluate(loop)).toEqual({
      kind: "error",
      message: "for loop bounds must be ordinal values, got String and Integer",
    });
  });

  test("conditions must be Boolean", () => {
    const { I } = capture();
    expect(I.evaluate(AST.whileStatement(int(1), AST.breakStatement()))).toEqual({
      kind: "error",
      message: "condition must be Boolean, got Integer",
    });
  });
});

describe("interpreter - case", () => {
  test("ranges, value lists and else", () => {
    const pick = (n: number) => {
      const { I } = capture();
      I.evaluate(AST.program([
        AST.varDeclaration("r", "String", AST.stringLiteral("")),
        AST.caseStatement(
          int(n),
          [
            AST.caseBranch([AST.rangeCaseValue(int(1), int(3))], AST.assignmentStatement("r", AST.stringLiteral("low"))),
            AST.caseBranch([int(4), int(5)], AST.assignmentStatement("r", AST.stringLiteral("mid"))),
          ],
          AST.assignmentStatement("r", AST.stringLiteral("high")),
        ),
      ]));
      return I.evaluate(id("r"));
    };
    expect(pick(2)).toEqual({ kind: "string", value: "low" });
    expect(pick(5)).toEqual({ kind: "string", value: "mid" });
    expect(pick(9)).toEqual({ kind: "string", value: "high" });
  });

  test("character ranges compare by code point", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.varDeclaration("r", "String", AST.stringLiteral("none")),
      AST.caseStatement(AST.stringLiteral("k"), [
        AST.caseBranch([AST.rangeCaseValue(AST.stringLiteral("a"), AST.stringLiteral("m"))], AST.assignmentStatement("r", AST.stringLiteral("first half"))),
      ]),
    ]));
    expect(I.evaluate(id("r"))).toEqual({ kind: "string", value: "first half" });
  });
});

describe("interpreter - exit", () => {
  test("exit with a value leaves the function from inside a loop", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.functionDeclaration(
        "FirstNegative",
        [AST.parameter("Values", AST.dynamicArrayType("Integer"))],
        [
          AST.forInStatement(
            "v",
            id("Values"),
            AST.ifStatement(AST.binaryExpression("<", id("v"), int(0)), AST.exitStatement(id("v"))),
            true,
          ),
          AST.assignmentStatement("Result", int(0)),
        ],
        { returnType: "Integer" },
      ),
    ]));
    const call = AST.functionCall("FirstNegative", [AST.arrayLiteral([int(3), AST.unaryExpression("-", int(2)), AST.unaryExpression("-", int(5))])]);
    expect(I.evaluate(call)).toEqual({ kind: "integer", value: -2 });
    expect(I.signal).toBe("none");
  });

  test("exit with a value outside a function is an error", () => {
    const { I } = capture();
    expect(I.evaluate(AST.exitStatement(int(1)))).toEqual({ kind: "error", message: "exit with a value outside a function" });
  });
});
