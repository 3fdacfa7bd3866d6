import { createHash } from 'crypto';

/**
 * 计算文本的MD5值
 * @param text 要计算MD5的文本
 * @returns MD5哈希值（32位十六进制字符串）
 */
export function calculateMD5(text: string): string {
  return createHash('md5').update(text, 'utf8').digest('hex');
}

/**
 * 为工作目录生成短标识：<名称>_<路径MD5前8位>，避免不同项目的同名 sketch 冲突
 */
export function uniqueWorkName(sketchPath: string, baseName: string): string {
  return `${baseName}_${calculateMD5(sketchPath).substring(0, 8)}`;
}
