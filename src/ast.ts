/* Syntax tree. Plain data; every node remembers where it came from. */

type At = { readonly line: number; readonly col: number };

export type UnaryOp = "-" | "not";
export type ArithOp = "+" | "-" | "*" | "/" | "%";
export type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type LogicOp = "and" | "or";
export type BinaryOp = ArithOp | CompareOp | LogicOp;

export type Expr = At & (
  | { readonly k: "Int"; readonly v: number }
  | { readonly k: "Float"; readonly v: number }
  | { readonly k: "Str"; readonly v: string }
  | { readonly k: "Bool"; readonly v: boolean }
  | { readonly k: "Ident"; readonly n: string }
  | { readonly k: "Unary"; readonly op: UnaryOp; readonly r: Expr }
  | { readonly k: "Binary"; readonly l: Expr; readonly op: BinaryOp; readonly r: Expr }
  | { readonly k: "Call"; readonly n: string; readonly args: readonly Expr[] }
);

export type Branch = { readonly c: Expr; readonly body: readonly Stmt[] };
export type Param = { readonly n: string; readonly type: string };

export type Stmt = At & (
  | { readonly k: "ExprS"; readonly e: Expr }
  | { readonly k: "Var"; readonly n: string; readonly init: Expr }
  | { readonly k: "Let"; readonly n: string; readonly init: Expr }
  | { readonly k: "Assign"; readonly n: string; readonly v: Expr }
  | { readonly k: "If"; readonly main: Branch; readonly elifs: readonly Branch[]; readonly otherwise?: readonly Stmt[] }
  | { readonly k: "For"; readonly n: string; readonly from: Expr; readonly to: Expr; readonly body: readonly Stmt[] }
  | { readonly k: "Proc"; readonly n: string; readonly params: readonly Param[]; readonly body: readonly Stmt[] }
  | { readonly k: "Return"; readonly v: Expr }
  | { readonly k: "Block"; readonly body: readonly Stmt[] }
);

export type Program = { readonly body: readonly Stmt[] };
