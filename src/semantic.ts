import type * as AST from "./ast";

/**
 * Node-to-type side table produced by the semantic pass. The evaluator only
 * reads it; a missing entry means "infer at run time".
 */
export class SemanticInfo {
  private readonly types = new WeakMap<AST.AstNode, AST.TypeExpression>();

  setType(node: AST.AstNode, type: AST.TypeExpression): void {
    this.types.set(node, type);
  }

  getType(node: AST.AstNode): AST.TypeExpression | undefined {
    return this.types.get(node);
  }

  clearType(node: AST.AstNode): void {
    this.types.delete(node);
  }
}
