import { describe, expect, test } from "vitest";
import * as AST from "../../src/ast";
import { Interpreter } from "../../src/interpreter";
import { SemanticInfo } from "../../src/semantic";

const int = AST.integerLiteral;
const str = AST.stringLiteral;
const id = AST.identifier;

function capture(): { I: Interpreter; out: string[] } {
  const out: string[] = [];
  return { I: new Interpreter({ output: (text) => out.push(text) }), out };
}

function speak(body: AST.Expression, directives: AST.MethodDirective[]): AST.FunctionDeclaration {
  return AST.functionDeclaration("Speak", [], [AST.assignmentStatement("Result", body)], { returnType: "String", directives });
}

function animals(): AST.Statement[] {
  return [
    AST.classDeclaration("TAnimal", {
      fields: [AST.fieldDeclaration("FName", "String")],
      methods: [
        AST.constructorDeclaration("Create", [AST.parameter("Name", "String")], [AST.assignmentStatement("FName", id("Name"))]),
        speak(str("..."), ["virtual"]),
        AST.functionDeclaration(
          "Describe",
          [],
          [AST.assignmentStatement("Result", AST.binaryExpression("+", AST.binaryExpression("+", id("FName"), str(" says ")), id("Speak")))],
          { returnType: "String" },
        ),
      ],
    }),
    AST.classDeclaration("TDog", { parent: "TAnimal", methods: [speak(str("Woof"), ["override"])] }),
    AST.classDeclaration("TLoudDog", {
      parent: "TDog",
      methods: [speak(AST.binaryExpression("+", AST.inheritedExpression("Speak"), str("!")), ["override"])],
    }),
  ];
}

describe("interpreter - classes", () => {
  test("virtual methods dispatch on the runtime class", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      ...animals(),
      AST.varDeclaration("a", "TAnimal", AST.methodCall(id("TDog"), "Create", [str("Rex")])),
      AST.varDeclaration("b", "TAnimal", AST.methodCall(id("TLoudDog"), "Create", [str("Max")])),
    ]));
    expect(I.evaluate(AST.methodCall(id("a"), "Describe"))).toEqual({ kind: "string", value: "Rex says Woof" });
    expect(I.evaluate(AST.methodCall(id("b"), "Describe"))).toEqual({ kind: "string", value: "Max says Woof!" });
  });

  test("ClassName, is and as", () => {
    const { I } = capture();
    I.evaluate(AST.program([...animals(), AST.varDeclaration("a", "TAnimal", AST.methodCall(id("TDog"), "Create", [str("Rex")]))]));
    expect(I.evaluate(AST.memberAccessExpression(id("a"), "ClassName"))).toEqual({ kind: "string", value: "TDog" });
    expect(I.evaluate(AST.isExpression(id("a"), "TAnimal"))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.isExpression(id("a"), "TLoudDog"))).toEqual({ kind: "boolean", value: false });
    expect(I.evaluate(AST.asExpression(id("a"), "TLoudDog"))).toEqual({ kind: "error", message: "invalid class typecast" });
    expect(I.evaluate(AST.isExpression(AST.nilLiteral(), "TAnimal"))).toEqual({ kind: "boolean", value: false });
  });

  test("abstract classes cannot be instantiated", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.classDeclaration("TShape", {
        methods: [AST.functionDeclaration("Area", [], undefined, { returnType: "Float", directives: ["abstract"] })],
      }),
      AST.classDeclaration("TSquare", {
        parent: "TShape",
        fields: [AST.fieldDeclaration("FSide", "Float")],
        methods: [
          AST.constructorDeclaration("Create", [AST.parameter("S", "Float")], [AST.assignmentStatement("FSide", id("S"))]),
          AST.functionDeclaration("Area", [], [AST.assignmentStatement("Result", AST.binaryExpression("*", id("FSide"), id("FSide")))], {
            returnType: "Float",
            directives: ["override"],
          }),
        ],
      }),
      AST.varDeclaration("s", "TShape", AST.methodCall(id("TSquare"), "Create", [int(3)])),
    ]));
    expect(I.evaluate(AST.methodCall(id("TShape"), "Create"))).toEqual({ kind: "error", message: "cannot instantiate abstract class TShape" });
    expect(I.evaluate(AST.methodCall(id("s"), "Area"))).toEqual({ kind: "float", value: 9 });
  });

  test("override without a virtual ancestor is rejected", () => {
    const { I } = capture();
    const decl = AST.classDeclaration("TBad", {
      methods: [AST.functionDeclaration("Foo", [], [], { directives: ["override"] })],
    });
    expect(I.evaluate(decl)).toEqual({
      kind: "error",
      message: "method TBad.Foo is marked override but no virtual method Foo exists in an ancestor",
    });
    expect(I.types.getClass("TBad")).toBeUndefined();
  });

  test("class variables are shared by every instance", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.classDeclaration("TTally", {
        fields: [AST.fieldDeclaration("Count", "Integer", int(0), true)],
        methods: [AST.constructorDeclaration("Create", [], [AST.assignmentStatement("Count", AST.binaryExpression("+", id("Count"), int(1)))])],
      }),
      AST.expressionStatement(AST.methodCall(id("TTally"), "Create")),
      AST.expressionStatement(AST.methodCall(id("TTally"), "Create")),
    ]));
    expect(I.evaluate(AST.memberAccessExpression(id("TTally"), "Count"))).toEqual({ kind: "integer", value: 2 });
  });

  test("inherited calls the parent constructor", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.classDeclaration("TBase", {
        fields: [AST.fieldDeclaration("FValue", "Integer")],
        methods: [AST.constructorDeclaration("Create", [AST.parameter("V", "Integer")], [AST.assignmentStatement("FValue", id("V"))])],
      }),
      AST.classDeclaration("TChild", {
        parent: "TBase",
        methods: [
          AST.constructorDeclaration(
            "Create",
            [AST.parameter("V", "Integer")],
            [AST.expressionStatement(AST.inheritedExpression("Create", [AST.binaryExpression("*", id("V"), int(2))]))],
          ),
        ],
      }),
    ]));
    const created = AST.methodCall(id("TChild"), "Create", [int(5)]);
    expect(I.evaluate(AST.memberAccessExpression(created, "FValue"))).toEqual({ kind: "integer", value: 10 });
  });

  test("Free runs the destructor and tolerates nil", () => {
    const { I, out } = capture();
    I.evaluate(AST.program([
      AST.classDeclaration("TResource", {
        methods: [AST.destructorDeclaration([AST.expressionStatement(AST.functionCall("PrintLn", [str("freed")]))])],
      }),
      AST.varDeclaration("r", undefined, AST.methodCall(id("TResource"), "Create")),
      AST.varDeclaration("none", "TResource"),
      AST.expressionStatement(AST.methodCall(id("r"), "Free")),
      AST.expressionStatement(AST.methodCall(id("none"), "Free")),
    ]));
    expect(out).toEqual(["freed\n"]);
    expect(I.evaluate(AST.methodCall(id("none"), "Run"))).toEqual({ kind: "error", message: "cannot call method 'Run' on nil" });
  });

  test("objects compare by identity", () => {
    const { I } = capture();
    I.evaluate(AST.program([
      AST.varDeclaration("a", undefined, AST.methodCall(id("TObject"), "Create")),
      AST.varDeclaration("b", undefined, id("a")),
      AST.varDeclaration("c", undefined, AST.methodCall(id("TObject"), "Create")),
    ]));
    expect(I.evaluate(AST.binaryExpression("=", id("a"), id("b")))).toEqual({ kind: "boolean", value: true });
    expect(I.evaluate(AST.binaryExpression("=", id("a"), id("c")))).toEqual({ kind: "boolean", value: false });
  });
});

describe("interpreter - static binding", () => {
  function hello(result: string): AST.FunctionDeclaration {
    return AST.functionDeclaration("Hello", [], [AST.assignmentStatement("Result", str(result))], { returnType: "String" });
  }

  function declare(I: Interpreter): void {
    I.evaluate(AST.program([
      AST.classDeclaration("TA", { methods: [hello("A")] }),
      AST.classDeclaration("TB", { parent: "TA", methods: [hello("B")] }),
      AST.varDeclaration("x", "TA", AST.methodCall(id("TB"), "Create")),
    ]));
  }

  test("without type information the runtime class decides", () => {
    const { I } = capture();
    declare(I);
    expect(I.evaluate(AST.methodCall(id("x"), "Hello"))).toEqual({ kind: "string", value: "B" });
  });

  test("a non-virtual method binds to the declared class", () => {
    const semanticInfo = new SemanticInfo();
    const I = new Interpreter({ output: () => {}, semanticInfo });
    declare(I);
    const receiver = id("x");
    semanticInfo.setType(receiver, AST.simpleTypeExpression("TA"));
    expect(I.evaluate(AST.methodCall(receiver, "Hello"))).toEqual({ kind: "string", value: "A" });
  });
});
