// Tree shape produced by the external parser. Only the constructs the
// lowering pass understands are modelled; anything else is rejected by the
// adapter before it reaches the compiler.

export interface TypeName {
  kind: 'TypeName';
  name: string;
}

export interface Parameter {
  kind: 'Parameter';
  type: TypeName;
  name?: string;
}

export type VisibilityKeyword = 'public' | 'private' | 'internal' | 'external';
export type MutabilityKeyword = 'pure' | 'view' | 'payable' | 'constant';

export type FunctionAttribute =
  | { kind: 'Visibility', value: VisibilityKeyword }
  | { kind: 'Mutability', value: MutabilityKeyword };

export interface BoolLiteral {
  kind: 'BoolLiteral';
  value: boolean;
}

export interface Variable {
  kind: 'Variable';
  name: string;
}

export interface Assign {
  kind: 'Assign';
  left: Expression;
  right: Expression;
}

export interface Not {
  kind: 'Not';
  operand: Expression;
}

export interface TypeExpression {
  kind: 'Type';
  type: TypeName;
}

export type Expression = BoolLiteral | Variable | Assign | Not | TypeExpression;

export type Statement =
  | { kind: 'ExpressionStatement', expression: Expression }
  | { kind: 'Return', expression?: Expression };

export interface FunctionDefinition {
  kind: 'FunctionDefinition';
  name: string;
  params: Parameter[];
  attributes: FunctionAttribute[];
  returns: Parameter[];
  /** Absent for declaration-only functions. */
  body?: Statement[];
}

export interface VariableDefinition {
  kind: 'VariableDefinition';
  name: string;
  type: TypeName;
  visibility?: VisibilityKeyword;
}

export interface ConstructorDefinition {
  kind: 'ConstructorDefinition';
  params: Parameter[];
  attributes: FunctionAttribute[];
  body?: Statement[];
}

export type ContractPart = FunctionDefinition | VariableDefinition | ConstructorDefinition;

export interface ContractDefinition {
  kind: 'ContractDefinition';
  name: string;
  parts: ContractPart[];
}

export interface PragmaDirective {
  kind: 'PragmaDirective';
  name: string;
  value: string;
}

export type SourceUnitPart = ContractDefinition | PragmaDirective;

export interface SourceUnit {
  kind: 'SourceUnit';
  parts: SourceUnitPart[];
}

export const ast = {
  bool: (value: boolean): BoolLiteral => ({ kind: 'BoolLiteral', value }),
  variable: (name: string): Variable => ({ kind: 'Variable', name }),
  assign: (left: Expression, right: Expression): Assign => ({ kind: 'Assign', left, right }),
  not: (operand: Expression): Not => ({ kind: 'Not', operand }),
  typeName: (name: string): TypeName => ({ kind: 'TypeName', name }),
  param: (type: string, name?: string): Parameter =>
    name === undefined
      ? { kind: 'Parameter', type: { kind: 'TypeName', name: type } }
      : { kind: 'Parameter', type: { kind: 'TypeName', name: type }, name },
} as const;
