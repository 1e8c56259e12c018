import { describe, expect, test } from "vitest";
import * as AST from "../../src/ast";
import { Interpreter } from "../../src/interpreter";

const int = AST.integerLiteral;
const str = AST.stringLiteral;
const id = AST.identifier;

function capture(options: { maxRecursionDepth?: number } = {}): { I: Interpreter; out: string[] } {
  const out: string[] = [];
  return { I: new Interpreter({ ...options, output: (text) => out.push(text) }), out };
}

function addDeclaration(): AST.FunctionDeclaration {
  return AST.functionDeclaration(
    "Add",
    [AST.parameter("a", "Integer"), AST.parameter("b", "Integer")],
    [AST.assignmentStatement("Result", AST.binaryExpression("+", id("a"), id("b")))],
    { returnType: "Integer" },
  );
}

describe("interpreter - routines", () => {
  test("functions return through Result", () => {
    const { I } = capture();
    I.evaluate(addDeclaration());
    expect(I.evaluate(AST.functionCall("Add", [int(2), int(3)]))).toEqual({ kind: "integer", value: 5 });
  });

  test("assigning to the function name sets Result", () => {
    const { I } = capture();
    I.evaluate(
      AST.functionDeclaration(
        "Double",
        [AST.parameter("x", "Integer")],
        [AST.assignmentStatement("Double", AST.binaryExpression("*", id("x"), int(2)))],
        { returnType: "Integer" },
      ),
    );
    expect(I.evaluate(AST.functionCall("Double", [int(21)]))).toEqual({ kind: "integer", value: 42 });
  });

  test("recursion", () => {
    const { I } = capture();
    I.evaluate(
      AST.functionDeclaration(
        "Fact",
        [AST.parameter("n", "Integer")],
        [
          AST.ifStatement(
            AST.binaryExpression("<=", id("n"), int(1)),
            AST.assignmentStatement("Result", int(1)),
            AST.assignmentStatement(
              "Result",
              AST.binaryExpression("*", id("n"), AST.functionCall("Fact", [AST.binaryExpression("-", id("n"), int(1))])),
            ),
          ),
        ],
        { returnType: "Integer" },
      ),
    );
    expect(I.evaluate(AST.functionCall("Fact", [int(5)]))).toEqual({ kind: "integer", value: 120 });
  });

  test("a bare procedure name is a call", () => {
    const { I, out } = capture();
    I.evaluate(AST.program([
      AST.functionDeclaration("SayHi", [], [AST.expressionStatement(AST.functionCall("PrintLn", [str("hi")]))]),
      AST.expressionStatement(id("SayHi")),
    ]));
    expect(out).toEqual(["hi\n"]);
  });

  test("var parameters write back to the caller", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.functionDeclaration(
        "Inc",
        [AST.parameter("x", "Integer", { modifier: "var" })],
        [AST.assignmentStatement("x", AST.binaryExpression("+", id("x"), int(1)))],
      ),
      AST.varDeclaration("n", undefined, int(1)),
      AST.expressionStatement(AST.functionCall("Inc", [id("n")])),
    ]));
    expect(I.evaluate(id("n"))).toEqual({ kind: "integer", value: 2 });
    expect(I.evaluate(AST.functionCall("Inc", [int(5)]))).toEqual({
      kind: "error",
      message: "var parameter requires an assignable argument",
    });
  });

  test("default parameter values fill missing arguments", () => {
    const { I } = capture();
    I.evaluate(
      AST.functionDeclaration(
        "Greet",
        [AST.parameter("Name", "String"), AST.parameter("Greeting", "String", { defaultValue: str("Hello") })],
        [AST.assignmentStatement("Result", AST.binaryExpression("+", AST.binaryExpression("+", id("Greeting"), str(", ")), id("Name")))],
        { returnType: "String" },
      ),
    );
    expect(I.evaluate(AST.functionCall("Greet", [str("Bob")]))).toEqual({ kind: "string", value: "Hello, Bob" });
    expect(I.evaluate(AST.functionCall("Greet", [str("Ann"), str("Hi")]))).toEqual({ kind: "string", value: "Hi, Ann" });
  });

  test("wrong argument counts are reported", () => {
    const { I } = capture();
    I.evaluate(addDeclaration());
    expect(I.evaluate(AST.functionCall("Add", [int(1)]))).toEqual({ kind: "error", message: "Add expects 2 arguments, got 1" });
    expect(I.evaluate(AST.functionCall("Nope", []))).toEqual({ kind: "error", message: "undefined function Nope" });
  });

  test("parameters may not repeat or shadow implicit names", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.functionDeclaration("Twice", [AST.parameter("A", "Integer"), AST.parameter("a", "Integer")], [], { returnType: "Integer" }),
      AST.functionDeclaration("Shadow", [AST.parameter("Result", "Integer")], [], { returnType: "Integer" }),
      AST.functionDeclaration("Plain", [AST.parameter("Result", "Integer")], [AST.expressionStatement(AST.functionCall("PrintLn", [id("Result")]))]),
    ]));
    expect(I.evaluate(AST.functionCall("Twice", [int(1), int(2)]))).toEqual({ kind: "error", message: "duplicate parameter a in Twice" });
    expect(I.evaluate(AST.functionCall("Shadow", [int(1)]))).toEqual({
      kind: "error",
      message: "parameter Result conflicts with implicit Result in Shadow",
    });
    expect(I.evaluate(AST.functionCall("Plain", [int(4)]))).toEqual({ kind: "nil", value: null });
  });

  test("methods may not name a parameter Self", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.classDeclaration("TBox", { methods: [AST.functionDeclaration("Put", [AST.parameter("Self", "Integer")], [])] }),
      AST.varDeclaration("b", "TBox", AST.methodCall(id("TBox"), "Create")),
    ]));
    expect(I.evaluate(AST.methodCall(id("b"), "Put", [int(1)]))).toEqual({
      kind: "error",
      message: "parameter Self conflicts with implicit Self in TBox.Put",
    });
  });

  test("lambda parameters are checked the same way", () => {
    const { I } = capture();
    const dup = AST.lambdaExpression([AST.parameter("x", "Integer"), AST.parameter("X", "Integer")], id("x"), "Integer");
    const shadow = AST.lambdaExpression([AST.parameter("Result", "Integer")], id("Result"), "Integer");
    I.evaluate(AST.program([AST.varDeclaration("dup", undefined, dup), AST.varDeclaration("shadow", undefined, shadow)]));
    expect(I.evaluate(AST.functionCall("dup", [int(1), int(2)]))).toEqual({ kind: "error", message: "duplicate parameter X in lambda" });
    expect(I.evaluate(AST.functionCall("shadow", [int(1)]))).toEqual({
      kind: "error",
      message: "parameter Result conflicts with implicit Result in lambda",
    });
  });
});

describe("interpreter - overloads", () => {
  function describeOverloads(I: Interpreter): void {
    I.evaluate(AST.program([
      AST.functionDeclaration("Describe", [AST.parameter("x", "Integer")], [AST.assignmentStatement("Result", str("int"))], {
        returnType: "String",
        isOverload: true,
      }),
      AST.functionDeclaration("Describe", [AST.parameter("s", "String")], [AST.assignmentStatement("Result", str("str"))], {
        returnType: "String",
        isOverload: true,
      }),
    ]));
  }

  test("the best-matching overload runs", () => {
    const { I } = capture();
    describeOverloads(I);
    expect(I.evaluate(AST.functionCall("Describe", [int(5)]))).toEqual({ kind: "string", value: "int" });
    expect(I.evaluate(AST.functionCall("Describe", [str("x")]))).toEqual({ kind: "string", value: "str" });
  });

  test("no overload matching the argument types", () => {
    const { I } = capture();
    describeOverloads(I);
    expect(I.evaluate(AST.functionCall("Describe", [AST.floatLiteral(1.5)]))).toEqual({
      kind: "error",
      message: "no overload of Describe matches arguments (Float)",
    });
    expect(I.evaluate(AST.functionCall("Describe", [int(1), int(2)]))).toEqual({
      kind: "error",
      message: "no overload of Describe accepts 2 arguments",
    });
  });

  test("a second declaration needs the overload marker", () => {
    const { I } = capture();
    I.evaluate(AST.functionDeclaration("F", [AST.parameter("a", "Integer")], []));
    expect(I.evaluate(AST.functionDeclaration("F", [AST.parameter("s", "String")], []))).toEqual({
      kind: "error",
      message: "function F already declared; mark overloads with 'overload'",
    });
  });
});

describe("interpreter - function values", () => {
  test("lambdas capture their scope", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.varDeclaration("count", "Integer", int(0)),
      AST.varDeclaration(
        "bump",
        undefined,
        AST.lambdaExpression([], AST.blockStatement([AST.assignmentStatement("count", int(1), "+=")])),
      ),
      AST.expressionStatement(AST.functionCall("bump")),
      AST.expressionStatement(AST.functionCall("bump")),
    ]));
    expect(I.evaluate(id("count"))).toEqual({ kind: "integer", value: 2 });
  });

  test("expression lambdas convert to their return type", () => {
    const { I } = capture();
    const half = AST.lambdaExpression([AST.parameter("x", "Integer")], AST.binaryExpression("div", id("x"), int(2)), "Float");
    I.evaluate(AST.varDeclaration("half", undefined, half));
    expect(I.evaluate(AST.functionCall("half", [int(9)]))).toEqual({ kind: "float", value: 4 });
  });

  test("routine pointers taken with @", () => {
    const { I } = capture();
    I.evaluate(AST.program([addDeclaration(), AST.varDeclaration("p", undefined, AST.addressOfExpression(id("Add")))]));
    expect(I.evaluate(AST.functionCall("p", [int(2), int(3)]))).toEqual({ kind: "integer", value: 5 });
  });
});

describe("interpreter - call stack", () => {
  test("unbounded recursion raises EScriptStackOverflow at the configured depth", () => {
    const { I } = capture({ maxRecursionDepth: 5 });
    const { exception } = I.run(AST.program([
      AST.functionDeclaration("Loop", [], [AST.expressionStatement(AST.functionCall("Loop"))]),
      AST.expressionStatement(AST.functionCall("Loop")),
    ]));
    expect(exception?.classInfo.name).toBe("EScriptStackOverflow");
    expect(exception?.message).toBe("Maximal recursion exceeded (5)");
    expect(exception?.callStack).toEqual(["Loop", "Loop", "Loop", "Loop", "Loop"]);
    expect(I.callStack).toEqual([]);
  });

  test("GetStackTrace lists frames innermost first", () => {
    const { I, out } = capture();
    I.evaluate(AST.program([
      AST.functionDeclaration("Inner", [], [AST.expressionStatement(AST.functionCall("PrintLn", [AST.functionCall("GetStackTrace")]))]),
      AST.functionDeclaration("Outer", [], [AST.expressionStatement(AST.functionCall("Inner"))]),
      AST.expressionStatement(AST.functionCall("Outer")),
    ]));
    expect(out).toEqual(["Inner\nOuter\n"]);
  });
});
