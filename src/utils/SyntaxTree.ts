import Parser from 'tree-sitter';
import type { SyntaxNode, Tree } from 'tree-sitter';
import Cpp from 'tree-sitter-cpp';

// 全局 Parser 实例，避免重复创建
let globalParser: Parser | null = null;

/**
 * 获取或创建 Parser 实例
 */
function getParser(): Parser {
    if (!globalParser) {
        globalParser = new Parser();
        globalParser.setLanguage(Cpp);
    }
    return globalParser;
}

// tree-sitter 默认的字符串缓冲区只有 32K，超过时需要显式放大
const DEFAULT_BUFFER_SIZE = 32 * 1024;

/**
 * 分析器关心的节点种类，其余一律归为 other
 */
export type SyntaxKind =
    | 'call_expression'
    | 'declaration'
    | 'init_declarator'
    | 'assignment_expression'
    | 'number_literal'
    | 'identifier'
    | 'field_identifier'
    | 'argument_list'
    | 'token'
    | 'other';

/**
 * 将 tree-sitter 的节点类型字符串映射为封闭的 SyntaxKind
 */
export function kindOf(node: SyntaxNode): SyntaxKind {
    switch (node.type) {
        case 'call_expression':
        case 'declaration':
        case 'init_declarator':
        case 'assignment_expression':
        case 'number_literal':
        case 'identifier':
        case 'field_identifier':
        case 'argument_list':
            return node.type;
        case '(':
        case ')':
        case ',':
            return 'token';
        default:
            return 'other';
    }
}

/**
 * 解析 C++ / Arduino 源码，失败时抛出带文件名的错误
 * @param sourceCode - 源码文本
 * @param fileName - 用于错误信息的文件名
 */
export function parseSource(sourceCode: string, fileName = '<memory>'): Tree {
    const parser = getParser();
    try {
        const bufferSize = Math.max(DEFAULT_BUFFER_SIZE, sourceCode.length + 1);
        return parser.parse(sourceCode, undefined, { bufferSize });
    } catch (e) {
        throw new Error(`Failed to parse ${fileName}: ${e instanceof Error ? e.message : String(e)}`);
    }
}

/**
 * 判断两个节点是否指向同一段源码
 * （tree-sitter 每次访问都会创建新的 JS 对象，不能用 === 比较）
 */
export function sameNode(a: SyntaxNode, b: SyntaxNode): boolean {
    return a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}

/**
 * 先序遍历：父节点在前，子节点从左到右。
 * 使用显式栈，避免深层嵌套表达式导致的递归溢出。
 */
export function walkPreOrder(root: SyntaxNode): SyntaxNode[] {
    const ordered: SyntaxNode[] = [];
    const stack: SyntaxNode[] = [root];

    while (stack.length > 0) {
        const node = stack.pop();
        if (!node) break;
        ordered.push(node);

        // 逆序压栈，保证出栈顺序为从左到右
        for (let i = node.childCount - 1; i >= 0; i--) {
            const child = node.child(i);
            if (child) {
                stack.push(child);
            }
        }
    }

    return ordered;
}
