declare module "tree-sitter-c" {
  const grammar: unknown;
  export default grammar;
}

declare module "tree-sitter-python" {
  const grammar: unknown;
  export default grammar;
}

declare module "tree-sitter-go" {
  const grammar: unknown;
  export default grammar;
}

declare module "tree-sitter-java" {
  const grammar: unknown;
  export default grammar;
}
