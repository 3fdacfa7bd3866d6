import fs from 'fs-extra';
import { coercePin } from './PinVerifier';
import type { SpecEntry } from './PinVerifier';

/**
 * 拆分一行 CSV，支持双引号包裹的字段以及 "" 转义
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"' && current.trim() === '') {
      current = '';
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);

  return fields;
}

/**
 * 解析规格表文本。第一行是表头，跳过；少于两个字段的行忽略。
 * 引脚是整数时转为数字，否则保留为符号名（如 A0）。
 */
export function parseSpecTable(content: string): SpecEntry[] {
  const entries: SpecEntry[] = [];
  const lines = content.split(/\r?\n/);

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) {
      continue;
    }
    const fields = splitCsvLine(line);
    if (fields.length < 2) {
      continue;
    }
    entries.push({
      functionName: fields[0].trim(),
      expectedPin: coercePin(fields[1]),
      line: i + 1
    });
  }

  return entries;
}

/**
 * 读取规格表文件
 */
export async function loadSpecTable(filePath: string): Promise<SpecEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    throw new Error(`Cannot read spec table ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseSpecTable(content);
}
