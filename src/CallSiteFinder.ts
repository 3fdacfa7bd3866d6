import type { SyntaxNode } from 'tree-sitter';
import { kindOf, walkPreOrder } from './utils/SyntaxTree';

/**
 * 一次函数调用的只读视图
 */
export interface CallSite {
  node: SyntaxNode;
  name: string;
  startIndex: number;
  endIndex: number;
}

/**
 * 按文档顺序查找所有被调函数名与 name 完全相同的调用表达式。
 * 不做重载、别名或命名空间解析：`Serial.begin` 需要整体匹配。
 */
export function findCalls(root: SyntaxNode, name: string): CallSite[] {
  const calls: CallSite[] = [];

  for (const node of walkPreOrder(root)) {
    if (kindOf(node) !== 'call_expression') {
      continue;
    }
    const callee = node.childForFieldName('function');
    if (callee && callee.text === name) {
      calls.push({
        node,
        name,
        startIndex: node.startIndex,
        endIndex: node.endIndex
      });
    }
  }

  return calls;
}

/**
 * 提取调用的参数文本（去掉括号和逗号），位置 0 通常是引脚，位置 1 是值。
 * 没有 arguments 字段时返回空数组，调用方需自行处理参数不足的情况。
 */
export function extractArgs(call: CallSite): string[] {
  const args = call.node.childForFieldName('arguments');
  if (!args) {
    return [];
  }

  const values: string[] = [];
  for (const child of args.children) {
    if (kindOf(child) === 'token') {
      continue;
    }
    values.push(child.text.trim());
  }
  return values;
}
