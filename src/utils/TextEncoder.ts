import * as iconv from 'iconv-lite';

// UTF-8 解码出现替换字符时依次尝试的编码
const FALLBACK_ENCODINGS = ['gbk', 'big5', 'shift_jis', 'latin1'];

/**
 * 将模拟器 / 构建脚本的输出解码为字符串，UTF-8 失败时尝试其他常见编码
 * @param buffer 要解码的 Buffer
 */
export function decodeToUtf8(buffer: Buffer): string {
  const utf8Text = iconv.decode(buffer, 'utf8');
  if (!utf8Text.includes('\uFFFD')) {
    return utf8Text;
  }

  for (const encoding of FALLBACK_ENCODINGS) {
    if (!iconv.encodingExists(encoding)) {
      continue;
    }
    const decoded = iconv.decode(buffer, encoding);
    if (!decoded.includes('\uFFFD')) {
      return decoded;
    }
  }

  return utf8Text;
}
