import { describe, it, expect } from 'vitest';
import { toEspMain, toHostCpp } from '../src/SketchConverter';

describe('toEspMain', () => {
  it('prefixes the ESP-IDF includes and the log tag', () => {
    expect(toEspMain('void setup() {}\n')).toBe([
      '//file: main.cpp',
      '#include "Arduino.h"',
      '#include "esp_log.h"',
      'static const char *TAG = "APP";',
      '',
      'void setup() {}',
      ''
    ].join('\n'));
  });

  it('names the tag constant after the configured tag', () => {
    expect(toEspMain('', 'LOG_TAG')).toContain('static const char *LOG_TAG = "APP";');
  });
});

describe('toHostCpp', () => {
  it('replaces the Arduino include and wraps setup and loop', () => {
    const output = toHostCpp('#include <Arduino.h>\nvoid setup() {}\nvoid loop() {}\n');
    const lines = output.split('\n');

    expect(lines[0]).toBe('// ===== Auto-generated from Arduino .ino =====');
    expect(lines).toContain('#define HIGH 1');
    expect(lines).toContain('// Arduino.h removed');
    expect(lines).not.toContain('#include <Arduino.h>');
    expect(lines).toContain('void run_setup() { setup(); }');
    expect(output.endsWith('#endif\n')).toBe(true);
  });

  it('keeps other include lines as they are', () => {
    const output = toHostCpp('#include <Servo.h>\n');
    expect(output.split('\n')).toContain('#include <Servo.h>');
  });
});
