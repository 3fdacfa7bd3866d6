import type { SyntaxNode } from 'tree-sitter';
import { kindOf, sameNode, walkPreOrder } from './utils/SyntaxTree';

/**
 * 变量名 -> 初始化文本（字面量、标识符或字段访问）
 */
export type BindingMap = Map<string, string>;

/**
 * 从 init_declarator 中取初始化值：
 * 直接的数字/标识符/字段标识符子节点，或赋值表达式的右侧。
 * 声明符本身（变量名）不算作值。多个候选时以最后一个为准。
 */
function initializerValue(initDeclarator: SyntaxNode): string | null {
  const declarator = initDeclarator.childForFieldName('declarator');
  let value: string | null = null;

  for (const child of initDeclarator.children) {
    if (declarator && sameNode(child, declarator)) {
      continue;
    }

    const kind = kindOf(child);
    switch (kind) {
      case 'number_literal':
      case 'identifier':
      case 'field_identifier':
        value = child.text.trim();
        break;
      case 'assignment_expression': {
        const right = child.childForFieldName('right');
        if (right) {
          value = right.text.trim();
        }
        break;
      }
      case 'call_expression':
      case 'declaration':
      case 'init_declarator':
      case 'argument_list':
      case 'token':
      case 'other':
        break;
      default: {
        const unreachable: never = kind;
        return unreachable;
      }
    }
  }

  return value;
}

/**
 * 单次先序遍历，收集所有 `类型 名称 = 值;` 形式的声明。
 *
 * 只解析一跳：`int A = 5; int B = A;` 中 B 绑定到文本 "A" 而不是 5。
 * 同名变量重复声明时按文档顺序后者覆盖前者，不区分作用域。
 */
export function resolveBindings(root: SyntaxNode): BindingMap {
  const bindings: BindingMap = new Map();

  for (const node of walkPreOrder(root)) {
    if (kindOf(node) !== 'declaration' || !node.childForFieldName('declarator')) {
      continue;
    }

    for (const child of node.children) {
      if (kindOf(child) !== 'init_declarator') {
        continue;
      }
      const name = child.childForFieldName('declarator');
      const value = initializerValue(child);
      if (name && value) {
        bindings.set(name.text.trim(), value);
      }
    }
  }

  return bindings;
}
