// =============================================================================
// CONSTRAINT EXPRESSION AST
// =============================================================================

/**
 * A propositional expression over feature names.
 *
 * @example
 * "A => (B | !C)" becomes:
 *   Implies(Var("A"), Or([Var("B"), Not(Var("C"))]))
 *
 * @public
 */
export type Expression =
  | VariableExpression
  | ConstantExpression
  | NotExpression
  | AndExpression
  | OrExpression
  | ImpliesExpression
  | IffExpression

/** @public */
export interface VariableExpression {
  readonly type: 'var'
  readonly name: string
}

/** @public */
export interface ConstantExpression {
  readonly type: 'const'
  readonly value: boolean
}

/** @public */
export interface NotExpression {
  readonly type: 'not'
  readonly operand: Expression
}

/** @public */
export interface AndExpression {
  readonly type: 'and'
  readonly operands: readonly Expression[]
}

/** @public */
export interface OrExpression {
  readonly type: 'or'
  readonly operands: readonly Expression[]
}

/** @public */
export interface ImpliesExpression {
  readonly type: 'implies'
  readonly left: Expression
  readonly right: Expression
}

/** @public */
export interface IffExpression {
  readonly type: 'iff'
  readonly left: Expression
  readonly right: Expression
}

/**
 * A lexical token of the constraint language.
 * @public
 */
export type ExpressionToken =
  | { readonly type: 'name'; readonly value: string; readonly position: number }
  | { readonly type: 'const'; readonly value: boolean; readonly position: number }
  | { readonly type: 'op'; readonly value: ExpressionOperator; readonly position: number }
  | { readonly type: 'lparen'; readonly position: number }
  | { readonly type: 'rparen'; readonly position: number }

/** @public */
export type ExpressionOperator = '!' | '&' | '|' | '=>' | '<=>'
