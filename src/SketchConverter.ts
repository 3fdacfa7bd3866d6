/**
 * 将 .ino sketch 转换为可以交给外部构建脚本的 C++ 源码
 */

const HOST_HEADER = [
  '// ===== Auto-generated from Arduino .ino =====',
  '#include <stdio.h>',
  '',
  '#define INPUT 0',
  '#define OUTPUT 1',
  '#define INPUT_PULLUP 2',
  '#define HIGH 1',
  '#define LOW 0',
  '',
  '// Arduino API functions are provided by the test harness'
];

const HOST_FOOTER = [
  '// Evaluator wrappers',
  '#ifdef __cplusplus',
  'extern "C" {',
  '#endif',
  '',
  'void run_setup() { setup(); }',
  'void run_loop()  { loop(); }',
  '',
  '#ifdef __cplusplus',
  '}',
  '#endif'
];

/**
 * ESP-IDF 工程的 main.cpp：引入 Arduino 与 esp_log，并定义日志 TAG
 */
export function toEspMain(sketch: string, tag = 'TAG'): string {
  const prelude = [
    '//file: main.cpp',
    '#include "Arduino.h"',
    '#include "esp_log.h"',
    `static const char *${tag} = "APP";`,
    ''
  ];
  return `${prelude.join('\n')}\n${sketch}`;
}

/**
 * 主机端 C++：补充引脚常量，去掉 Arduino.h，追加 run_setup / run_loop 包装
 */
export function toHostCpp(sketch: string): string {
  const body = sketch
    .split(/\r?\n/)
    .map((line) => (line === '#include <Arduino.h>' ? '// Arduino.h removed' : line));

  // 末尾换行产生的空行不重复输出
  if (body.length > 0 && body[body.length - 1] === '') {
    body.pop();
  }

  return [...HOST_HEADER, ...body, ...HOST_FOOTER].join('\n') + '\n';
}
