import * as AST from "../ast";

export const BUILTIN_EXCEPTION_CLASSES = [
  "EConvertError",
  "ERangeError",
  "EDivByZero",
  "EAssertionFailed",
  "EInvalidOp",
  "EScriptStackOverflow",
  "EIntOverflow",
] as const;

/** Root class and builtin exception hierarchy, declared as ordinary script classes. */
export function buildPrelude(): AST.Statement[] {
  const tObject = AST.classDeclaration("TObject", {
    methods: [
      AST.constructorDeclaration("Create", [], []),
      AST.functionDeclaration("Destroy", [], [], { kind: "destructor", directives: ["virtual"] }),
    ],
  });

  const exception = AST.classDeclaration("Exception", {
    parent: "TObject",
    fields: [AST.fieldDeclaration("Message", "String")],
    methods: [
      AST.constructorDeclaration(
        "Create",
        [AST.parameter("Msg", "String")],
        [AST.assignmentStatement("Message", AST.identifier("Msg"))],
      ),
    ],
  });

  const subclasses = BUILTIN_EXCEPTION_CLASSES.map((name) => AST.classDeclaration(name, { parent: "Exception" }));

  const eHost = AST.classDeclaration("EHost", {
    parent: "Exception",
    fields: [AST.fieldDeclaration("ExceptionClass", "String")],
    methods: [
      AST.constructorDeclaration(
        "Create",
        [AST.parameter("Cls", "String"), AST.parameter("Msg", "String")],
        [
          AST.assignmentStatement("ExceptionClass", AST.identifier("Cls")),
          AST.assignmentStatement("Message", AST.identifier("Msg")),
        ],
      ),
    ],
  });

  return [tObject, exception, ...subclasses, eHost];
}
