import type { Location } from '../utils/types.js';
import type { Type } from './types.js';

export type LiteralValue =
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'char'; value: string }
  | { kind: 'string'; value: string };

export type BinaryOp = '+' | '-' | '*' | '/' | '%' | '==' | '!=' | '<' | '<=' | '>' | '>=' | '&&' | '||';
export type UnaryOp = '-' | '!' | '*' | '&';

export interface TesselNode {
  location?: Location;
}

export interface Program extends TesselNode {
  type: 'Program';
  imports: ImportDecl[];
  exports: ExportItem[];
  externs: ExternFnDecl[];
  functions: FnDecl[];
  structs: StructDecl[];
  enums: EnumDecl[];
  globals: LetStmt[];
}

export interface ImportDecl extends TesselNode {
  type: 'Import';
  module: string;
  alias?: string;
}

/** `kind` is absent for names listed in `export { a, b };`, which the resolver looks up. */
export interface ExportItem extends TesselNode {
  kind?: 'function' | 'struct' | 'enum';
  name: string;
}

export interface Param extends TesselNode {
  name: string;
  typeName: Type;
}

export interface FnDecl extends TesselNode {
  type: 'FnDecl';
  name: string;
  params: Param[];
  returnType?: Type;
  body: Statement[];
  exported: boolean;
}

export interface ExternFnDecl extends TesselNode {
  type: 'ExternFnDecl';
  name: string;
  params: Param[];
  returnType?: Type;
  variadic: boolean;
}

export interface StructField extends TesselNode {
  name: string;
  typeName: Type;
}

export interface StructDecl extends TesselNode {
  type: 'StructDecl';
  name: string;
  fields: StructField[];
  exported: boolean;
}

export interface EnumVariantDecl extends TesselNode {
  name: string;
  value: number;
}

export interface EnumDecl extends TesselNode {
  type: 'EnumDecl';
  name: string;
  variants: EnumVariantDecl[];
  exported: boolean;
}

export type Statement =
  | LetStmt
  | ConstStmt
  | AssignStmt
  | ReturnStmt
  | IfStmt
  | WhileStmt
  | ForStmt
  | BreakStmt
  | ContinueStmt
  | ExprStmt;

export interface LetStmt extends TesselNode {
  type: 'Let';
  name: string;
  mutable: boolean;
  typeName?: Type;
  value?: Expr;
}

export interface ConstStmt extends TesselNode {
  type: 'Const';
  name: string;
  typeName?: Type;
  value: Expr;
}

export interface AssignStmt extends TesselNode {
  type: 'Assign';
  target: Expr;
  value: Expr;
}

export interface ReturnStmt extends TesselNode {
  type: 'Return';
  value?: Expr;
}

export interface IfStmt extends TesselNode {
  type: 'If';
  condition: Expr;
  thenBlock: Statement[];
  elseBlock?: Statement[];
}

export interface WhileStmt extends TesselNode {
  type: 'While';
  condition: Expr;
  body: Statement[];
}

export interface ForStmt extends TesselNode {
  type: 'For';
  variable: string;
  iterable: Expr;
  body: Statement[];
}

export interface BreakStmt extends TesselNode {
  type: 'Break';
}

export interface ContinueStmt extends TesselNode {
  type: 'Continue';
}

export interface ExprStmt extends TesselNode {
  type: 'ExprStmt';
  expr: Expr;
}

export type Expr =
  | LiteralExpr
  | IdentifierExpr
  | BinaryExpr
  | UnaryExpr
  | CallExpr
  | MemberExpr
  | IndexExpr
  | ArrayLiteralExpr
  | NewArrayExpr
  | StructLiteralExpr
  | RangeExpr
  | NewExpr
  | DeleteExpr
  | CastExpr
  | TernaryExpr
  | EnumAccessExpr
  | MatchExpr
  | TryExpr;

export interface LiteralExpr extends TesselNode {
  type: 'Literal';
  literal: LiteralValue;
}

export interface IdentifierExpr extends TesselNode {
  type: 'Identifier';
  name: string;
}

export interface BinaryExpr extends TesselNode {
  type: 'Binary';
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export interface UnaryExpr extends TesselNode {
  type: 'Unary';
  op: UnaryOp;
  operand: Expr;
}

export interface CallExpr extends TesselNode {
  type: 'Call';
  callee: Expr;
  args: Expr[];
}

export interface MemberExpr extends TesselNode {
  type: 'Member';
  object: Expr;
  property: string;
}

export interface IndexExpr extends TesselNode {
  type: 'Index';
  object: Expr;
  index: Expr;
}

export interface ArrayLiteralExpr extends TesselNode {
  type: 'ArrayLiteral';
  elements: Expr[];
}

/** `new [T]()`: an empty growable array. */
export interface NewArrayExpr extends TesselNode {
  type: 'NewArray';
  elementType: Type;
}

export interface StructLiteralField extends TesselNode {
  name: string;
  value: Expr;
}

export interface StructLiteralExpr extends TesselNode {
  type: 'StructLiteral';
  name: string;
  fields: StructLiteralField[];
}

export interface RangeExpr extends TesselNode {
  type: 'Range';
  start: Expr;
  end: Expr;
}

export interface NewExpr extends TesselNode {
  type: 'New';
  value: Expr;
}

export interface DeleteExpr extends TesselNode {
  type: 'Delete';
  value: Expr;
}

export interface CastExpr extends TesselNode {
  type: 'Cast';
  value: Expr;
  targetType: Type;
}

export interface TernaryExpr extends TesselNode {
  type: 'Ternary';
  condition: Expr;
  whenTrue: Expr;
  whenFalse: Expr;
}

export interface EnumAccessExpr extends TesselNode {
  type: 'EnumAccess';
  enumName: string;
  variant: string;
}

export type MatchPattern =
  | { kind: 'wildcard'; location?: Location }
  | { kind: 'literal'; literal: LiteralValue; location?: Location }
  | { kind: 'variant'; enumName: string; variant: string; binding?: string; location?: Location };

export interface MatchArm extends TesselNode {
  pattern: MatchPattern;
  body: Expr;
}

export interface MatchExpr extends TesselNode {
  type: 'Match';
  scrutinee: Expr;
  arms: MatchArm[];
}

export interface TryExpr extends TesselNode {
  type: 'Try';
  value: Expr;
}

export type BindingNode = LetStmt | ConstStmt | ForStmt | Param;
