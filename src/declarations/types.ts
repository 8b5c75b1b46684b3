export type DeclarationName = string;

export type DeclarationKind =
  | "struct"
  | "interface"
  | "function"
  | "variable"
  | "constant"
  | "import";

/** Fixed report order. */
export const DECLARATION_KINDS: readonly DeclarationKind[] = [
  "struct",
  "interface",
  "function",
  "variable",
  "constant",
  "import",
];

interface DeclarationBase {
  /** Human-readable source location, e.g. "service.go:12:6". */
  position: string;
  /** Zero-based index in the resolved order. Assigned by the resolver, 0 on input. */
  level: number;
}

interface PackageMember extends DeclarationBase {
  name: DeclarationName;
  package: string;
}

export interface StructDecl extends PackageMember {
  /** "name type" per named field, bare "type" for embedded fields. */
  fields: string[];
}

export interface InterfaceDecl extends PackageMember {
  /** Raw signatures "Name(params) returns", or an embedded interface type. */
  methods: string[];
}

export interface FunctionDecl extends PackageMember {
  /** Receiver type, "" for plain functions. */
  receiver: string;
  parameters: string[];
  returns: string[];
}

export interface VariableDecl extends PackageMember {
  /** "inferred" when only an initializer is present. */
  type: string;
}

export interface ConstantDecl extends PackageMember {
  type: string;
  value: string;
}

/** Imports are keyed by path. */
export interface ImportDecl extends DeclarationBase {
  /** "" when the import is not renamed. */
  alias: string;
  path: string;
}

export interface DeclarationByKind {
  struct: StructDecl;
  interface: InterfaceDecl;
  function: FunctionDecl;
  variable: VariableDecl;
  constant: ConstantDecl;
  import: ImportDecl;
}

export type AnyDeclaration = DeclarationByKind[DeclarationKind];
