import type { SyntaxNode } from 'tree-sitter';
import { findCalls, extractArgs } from './CallSiteFinder';
import type { BindingMap } from './BindingResolver';
import { UNKNOWN_ARG } from './InstrumentationRewriter';

export type PinId = number | string;

/**
 * 规格表中的一行：期望出现的函数及其引脚
 */
export interface SpecEntry {
  functionName: string;
  expectedPin: PinId;
  line: number;
}

export type VerificationStatus = 'FOUND' | 'PRESENT_DIFFERENT' | 'MISSING';

export interface VerificationResult {
  entry: SpecEntry;
  status: VerificationStatus;
  observedPins: string[];  // 去重并排序
  validPin: boolean;       // 期望引脚是否属于该函数惯用的命名空间，仅供参考
}

// 模拟引脚与数字引脚的命名空间，字符串形式和数字形式都算
export const ANALOG_PINS: ReadonlySet<PinId> = new Set<PinId>([
  'A0', 'A1', 'A2', 'A3', 'A4', 'A5',
  0, 1, 2, 3, 4, 5
]);

export const DIGITAL_PINS: ReadonlySet<PinId> = new Set<PinId>([
  ...Array.from({ length: 14 }, (_, i) => `D${i}`),
  ...Array.from({ length: 14 }, (_, i) => i)
]);

/**
 * 引脚是否属于函数对应的命名空间。未知函数一律视为合法。
 */
export function isValidPin(functionName: string, pin: PinId): boolean {
  switch (functionName) {
    case 'analogRead':
      return ANALOG_PINS.has(pin);
    case 'digitalRead':
    case 'digitalWrite':
      return DIGITAL_PINS.has(pin);
    default:
      return true;
  }
}

/**
 * 整数文本转为数字，其余保持原样（如 "A0"、"LED_BUILTIN"）
 */
export function coercePin(text: string): PinId {
  const trimmed = text.trim();
  if (/^[+-]?\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  return trimmed;
}

/**
 * 收集某个函数所有调用实际使用的引脚（经过一跳变量解析）
 */
export function observedPins(root: SyntaxNode, bindings: BindingMap, functionName: string): string[] {
  const pins = new Set<string>();

  for (const call of findCalls(root, functionName)) {
    const args = extractArgs(call);
    const pinArg = args.length > 0 ? args[0] : UNKNOWN_ARG;
    const resolved = bindings.get(pinArg) ?? pinArg;
    pins.add(String(coercePin(resolved)));
  }

  return [...pins].sort();
}

/**
 * 对单行规格分类：引脚匹配 -> FOUND；函数出现但引脚不同 -> PRESENT_DIFFERENT；否则 MISSING。
 * 命名空间只影响 validPin，不参与分类。
 */
export function classify(entry: SpecEntry, pins: string[]): VerificationResult {
  let status: VerificationStatus;
  if (pins.includes(String(entry.expectedPin))) {
    status = 'FOUND';
  } else if (pins.length > 0) {
    status = 'PRESENT_DIFFERENT';
  } else {
    status = 'MISSING';
  }

  return {
    entry,
    status,
    observedPins: pins,
    validPin: isValidPin(entry.functionName, entry.expectedPin)
  };
}

/**
 * 按规格表逐行检查源码中的引脚使用情况
 */
export function verify(root: SyntaxNode, bindings: BindingMap, spec: SpecEntry[]): VerificationResult[] {
  return spec.map((entry) => classify(entry, observedPins(root, bindings, entry.functionName)));
}

/**
 * 生成一行人类可读的检查结果
 */
export function formatResult(result: VerificationResult): string {
  const { functionName, expectedPin } = result.entry;
  switch (result.status) {
    case 'FOUND':
      return `[FOUND] ${functionName}(${expectedPin}) is present in the code.`;
    case 'PRESENT_DIFFERENT':
      return `[PRESENT] ${functionName} is used, but with different pin(s): ${result.observedPins.join(', ')}`;
    case 'MISSING':
      return `[MISSING] ${functionName}(${expectedPin}) is NOT present in the code.`;
  }
}
