import type { CallArguments, CallNode, Node, NodeKind, NodeOfKind } from "./model/ast.js";

function callArguments(args: CallArguments): Node[] {
  const out: Node[] = [...args.args, ...args.kwargs];
  if (args.dynArgs) out.push(args.dynArgs);
  if (args.dynKwargs) out.push(args.dynKwargs);
  return out;
}

/**
 * Direct children of a node, in source order.
 * Exhaustive over the node union: adding a node kind fails to compile here.
 */
export function childNodes(node: Node): Node[] {
  switch (node.$kind) {
    case "Template":
      return node.body;

    // Statements
    case "Output":
      return node.nodes;
    case "If":
      return [node.test, ...node.body, ...node.elifs, ...node.else_];
    case "For":
      return [node.target, node.iter, ...(node.test ? [node.test] : []), ...node.body, ...node.else_];
    case "Macro":
      return [...node.args, ...node.defaults, ...node.body];
    case "CallBlock":
      return [node.call, ...node.args, ...node.defaults, ...node.body];
    case "FilterBlock":
      return [node.filter, ...node.body];
    case "Assign":
      return [node.target, node.node];
    case "AssignBlock":
      return [node.target, ...(node.filter ? [node.filter] : []), ...node.body];
    case "ExprStmt":
      return [node.node];
    case "Block":
      return node.body;
    case "Extends":
      return [node.template];
    case "Include":
      return [node.template];
    case "Import":
      return [node.template];
    case "FromImport":
      return [node.template];
    case "With":
      return [...node.targets, ...node.values, ...node.body];
    case "NamedBlock":
      return [...node.kwargs, ...node.body];

    // Expressions
    case "Const":
    case "Name":
    case "TemplateData":
      return [];
    case "Tuple":
    case "List":
      return node.items;
    case "Dict":
      return node.items;
    case "Pair":
      return [node.key, node.value];
    case "Keyword":
      return [node.value];
    case "CondExpr":
      return [node.expr1, node.test, ...(node.expr2 ? [node.expr2] : [])];
    case "BinExpr":
    case "And":
    case "Or":
      return [node.left, node.right];
    case "UnaryExpr":
    case "Not":
      return [node.node];
    case "Compare":
      return [node.expr, ...node.ops];
    case "Operand":
      return [node.expr];
    case "Concat":
      return node.nodes;
    case "Call":
      return [node.node, ...callArguments(node)];
    case "Filter":
      return [...(node.node ? [node.node] : []), ...callArguments(node)];
    case "Test":
      return [node.node, ...callArguments(node)];
    case "Getattr":
      return [node.node];
    case "Getitem":
      return [node.node, node.arg];
    case "Slice":
      return [node.start, node.stop, node.step].filter((n): n is NonNullable<typeof n> => n !== null);
  }
}

function isKind<K extends NodeKind>(node: Node, kind: K): node is NodeOfKind<K> {
  return node.$kind === kind;
}

/** Every node of `kind` under `root` (root included), depth-first pre-order. */
export function findAll<K extends NodeKind>(root: Node, kind: K): NodeOfKind<K>[] {
  const out: NodeOfKind<K>[] = [];
  const stack: Node[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (isKind(node, kind)) out.push(node);
    const children = childNodes(node);
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) stack.push(child);
    }
  }
  return out;
}

/** All call expressions in a template, outermost first. */
export function collectCalls(root: Node): CallNode[] {
  return findAll(root, "Call");
}
