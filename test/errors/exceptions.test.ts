import { describe, expect, test } from "vitest";
import * as AST from "../../src/ast";
import { Interpreter } from "../../src/interpreter";

const int = AST.integerLiteral;
const str = AST.stringLiteral;
const id = AST.identifier;
const print = (arg: AST.Expression) => AST.expressionStatement(AST.functionCall("PrintLn", [arg]));
const create = (cls: string, msg: string) => AST.methodCall(id(cls), "Create", [str(msg)]);

function capture(): { I: Interpreter; out: string[] } {
  const out: string[] = [];
  return { I: new Interpreter({ output: (text) => out.push(text) }), out };
}

describe("interpreter - try/except", () => {
  test("handlers bind the exception object", () => {
    const { I } = capture();
    const { exception } = I.run(AST.program([
      AST.varDeclaration("msg", "String"),
      AST.tryStatement(
        AST.blockStatement([AST.raiseStatement(create("Exception", "boom"))]),
        AST.exceptClause([
          AST.exceptionHandler("Exception", AST.assignmentStatement("msg", AST.memberAccessExpression(id("E"), "Message")), "E"),
        ]),
      ),
    ]));
    expect(exception).toBeNull();
    expect(I.evaluate(id("msg"))).toEqual({ kind: "string", value: "boom" });
  });

  test("the first handler whose class matches runs", () => {
    const { I } = capture();
    I.run(AST.program([
      AST.varDeclaration("r", "String"),
      AST.tryStatement(
        AST.blockStatement([AST.varDeclaration("n", undefined, AST.binaryExpression("div", int(1), int(0)))]),
        AST.exceptClause([
          AST.exceptionHandler("EConvertError", AST.assignmentStatement("r", str("convert"))),
          AST.exceptionHandler("EDivByZero", AST.assignmentStatement("r", AST.memberAccessExpression(id("E"), "Message")), "E"),
          AST.exceptionHandler("Exception", AST.assignmentStatement("r", str("other"))),
        ]),
      ),
    ]));
    expect(I.evaluate(id("r"))).toEqual({ kind: "string", value: "Division by zero" });
  });

  test("except-else catches what no handler matched", () => {
    const { I } = capture();
    I.run(AST.program([
      AST.varDeclaration("r", "String"),
      AST.tryStatement(
        AST.blockStatement([AST.raiseStatement(create("EInvalidOp", "bad"))]),
        AST.exceptClause(
          [AST.exceptionHandler("EConvertError", AST.assignmentStatement("r", str("convert")))],
          AST.blockStatement([AST.assignmentStatement("r", AST.memberAccessExpression(id("ExceptObject"), "ClassName"))]),
        ),
      ),
    ]));
    expect(I.evaluate(id("r"))).toEqual({ kind: "string", value: "EInvalidOp" });
    expect(I.evaluate(id("ExceptObject"))).toEqual({ kind: "nil", value: null });
  });

  test("unmatched exceptions keep propagating", () => {
    const { I, out } = capture();
    const { exception } = I.run(AST.program([
      AST.tryStatement(
        AST.blockStatement([AST.raiseStatement(create("EInvalidOp", "bad"))]),
        AST.exceptClause([AST.exceptionHandler("EConvertError", print(str("convert")))]),
      ),
      print(str("after")),
    ]));
    expect(out).toEqual([]);
    expect(exception?.classInfo.name).toBe("EInvalidOp");
    expect(exception?.message).toBe("bad");
  });

  test("bare raise re-raises the handled exception", () => {
    const { I, out } = capture();
    const inner = AST.tryStatement(
      AST.blockStatement([AST.raiseStatement(create("EConvertError", "inner"))]),
      AST.exceptClause([AST.exceptionHandler("Exception", AST.blockStatement([print(str("caught")), AST.raiseStatement()]))]),
    );
    I.run(AST.program([
      AST.varDeclaration("r", "String"),
      AST.tryStatement(
        AST.blockStatement([inner]),
        AST.exceptClause([
          AST.exceptionHandler(
            "EConvertError",
            AST.assignmentStatement("r", AST.binaryExpression("+", str("outer "), AST.memberAccessExpression(id("E"), "Message"))),
            "E",
          ),
        ]),
      ),
    ]));
    expect(out).toEqual(["caught\n"]);
    expect(I.evaluate(id("r"))).toEqual({ kind: "string", value: "outer inner" });
  });

  test("StrToInt failures raise EConvertError", () => {
    const { I } = capture();
    I.run(AST.program([
      AST.varDeclaration("r", "String"),
      AST.tryStatement(
        AST.blockStatement([AST.varDeclaration("n", "Integer", AST.functionCall("StrToInt", [str("abc")]))]),
        AST.exceptClause([AST.exceptionHandler("EConvertError", AST.assignmentStatement("r", AST.memberAccessExpression(id("E"), "Message")), "E")]),
      ),
    ]));
    expect(I.evaluate(id("r"))).toEqual({ kind: "string", value: "'abc' is not a valid integer" });
  });
});

describe("interpreter - try/finally", () => {
  test("finally runs while an exception unwinds", () => {
    const { I, out } = capture();
    const { exception } = I.run(AST.program([
      AST.tryStatement(
        AST.blockStatement([print(str("body")), AST.raiseStatement(create("Exception", "x")), print(str("skipped"))]),
        undefined,
        AST.blockStatement([print(str("cleanup"))]),
      ),
    ]));
    expect(out).toEqual(["body\n", "cleanup\n"]);
    expect(exception?.message).toBe("x");
  });

  test("exit inside try still runs finally", () => {
    const { I, out } = capture();
    I.evaluate(
      AST.functionDeclaration(
        "F",
        [],
        [
          AST.assignmentStatement("Result", int(1)),
          AST.tryStatement(AST.blockStatement([AST.exitStatement()]), undefined, AST.blockStatement([print(str("finally"))])),
          AST.assignmentStatement("Result", int(2)),
        ],
        { returnType: "Integer" },
      ),
    );
    expect(I.evaluate(AST.functionCall("F"))).toEqual({ kind: "integer", value: 1 });
    expect(out).toEqual(["finally\n"]);
  });

  test("an exception raised in finally replaces the pending one", () => {
    const { I } = capture();
    const { exception } = I.run(AST.program([
      AST.tryStatement(
        AST.blockStatement([AST.raiseStatement(create("ERangeError", "first"))]),
        undefined,
        AST.blockStatement([AST.raiseStatement(create("EConvertError", "second"))]),
      ),
    ]));
    expect(exception?.classInfo.name).toBe("EConvertError");
    expect(exception?.message).toBe("second");
  });

  test("a base-class handler listed first wins and finally still runs", () => {
    const { I, out } = capture();
    const { exception } = I.run(AST.program([
      AST.varDeclaration("r", "String"),
      AST.tryStatement(
        AST.blockStatement([AST.raiseStatement(create("EConvertError", "bad"))]),
        AST.exceptClause([
          AST.exceptionHandler("Exception", AST.assignmentStatement("r", str("base"))),
          AST.exceptionHandler("EConvertError", AST.assignmentStatement("r", str("specific"))),
        ]),
        AST.blockStatement([print(str("done"))]),
      ),
    ]));
    expect(exception).toBeNull();
    expect(out).toEqual(["done\n"]);
    expect(I.evaluate(id("r"))).toEqual({ kind: "string", value: "base" });
  });

  test("evaluator errors abort the run without running finally", () => {
    const { I, out } = capture();
    const { value, exception } = I.run(AST.program([
      AST.tryStatement(
        AST.blockStatement([AST.expressionStatement(id("Missing"))]),
        AST.exceptClause([AST.exceptionHandler("Exception", print(str("handled")))]),
        AST.blockStatement([print(str("finally"))]),
      ),
    ]));
    expect(value).toEqual({ kind: "error", message: "undefined identifier: Missing" });
    expect(exception).toBeNull();
    expect(out).toEqual([]);
  });
});

describe("interpreter - raise", () => {
  test("raise needs an exception object", () => {
    const { I } = capture();
    expect(I.evaluate(AST.raiseStatement())).toEqual({ kind: "error", message: "bare raise with no active exception" });
    expect(I.evaluate(AST.raiseStatement(int(5)))).toEqual({ kind: "error", message: "raise requires exception object, got Integer" });
  });

  test("the raise position is recorded from the statement", () => {
    const { I } = capture();
    const { exception } = I.run(AST.program([AST.at(AST.raiseStatement(create("Exception", "here")), 3, 5)]));
    expect(exception?.position).toEqual({ line: 3, column: 5 });
  });

  test("uncaught exceptions format with the frames innermost first", () => {
    const { I } = capture();
    const { exception } = I.run(AST.program([
      AST.functionDeclaration("Inner", [], [AST.raiseStatement(create("EInvalidOp", "bad state"))]),
      AST.functionDeclaration("Outer", [], [AST.expressionStatement(AST.functionCall("Inner"))]),
      AST.expressionStatement(AST.functionCall("Outer")),
    ]));
    expect(exception).not.toBeNull();
    if (!exception) return;
    expect(exception.callStack).toEqual(["Outer", "Inner"]);
    expect(I.formatUncaughtException(exception)).toBe("Runtime Error: EInvalidOp: bad state\n  at Inner\n  at Outer");
  });
});
