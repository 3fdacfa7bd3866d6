import type { CompareMode } from './ProbeConfig';

export interface CompareOptions {
  mode?: CompareMode;
  weight?: number;
}

export interface CompareResult {
  passed: boolean;
  score: number;
  missingLines: string[];  // 未在实际输出中找到的期望行
  error?: string;
}

/**
 * 逐行去掉首尾空白并丢弃空行
 */
export function normalizeLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * 比较模拟器输出与期望输出。
 * substring：每一行期望输出都是某一行实际输出的子串，顺序不限；
 * sequence：期望行必须按顺序依次出现在实际输出中。
 * 期望输出为空时，只要有任何实际输出即视为通过。
 */
export function compareOutput(actual: string, expected: string, options: CompareOptions = {}): CompareResult {
  const mode = options.mode || 'substring';
  const weight = options.weight ?? 1;
  const actualLines = normalizeLines(actual);
  const expectedLines = normalizeLines(expected);

  let missingLines: string[];
  if (expectedLines.length === 0) {
    missingLines = [];
    const passed = actualLines.length > 0;
    return {
      passed,
      score: passed ? weight : 0,
      missingLines,
      error: passed ? undefined : 'No output produced.'
    };
  }

  if (mode === 'sequence') {
    missingLines = [];
    let cursor = 0;
    for (const expectedLine of expectedLines) {
      let found = false;
      while (cursor < actualLines.length) {
        const matched = actualLines[cursor].includes(expectedLine);
        cursor++;
        if (matched) {
          found = true;
          break;
        }
      }
      if (!found) {
        missingLines.push(expectedLine);
      }
    }
  } else {
    missingLines = expectedLines.filter(
      (expectedLine) => !actualLines.some((actualLine) => actualLine.includes(expectedLine))
    );
  }

  const passed = missingLines.length === 0;
  return {
    passed,
    score: passed ? weight : 0,
    missingLines,
    error: passed ? undefined : 'Expected output not found in actual output.'
  };
}
