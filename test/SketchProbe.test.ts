import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { SketchProbe } from '../src/SketchProbe';
import { Logger } from '../src/utils/Logger';
import { loadConfig } from '../src/ProbeConfig';

const BLINK = path.join(__dirname, 'fixtures', 'blink.ino');
const BLINK_SPEC = path.join(__dirname, 'fixtures', 'blink.csv');

describe('SketchProbe', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sketch-probe-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(workDir);
  });

  function createProbe(harnessDir = workDir): SketchProbe {
    return new SketchProbe(new Logger(), loadConfig({ harnessDir, buildScript: 'build.sh' }, {}));
  }

  it('writes the instrumented sketch', async () => {
    const outputPath = path.join(workDir, 'out', 'blink.ino');
    const result = await createProbe().instrumentFile(BLINK, outputPath);

    expect(result.success).toBe(true);
    expect(result.edits).toHaveLength(2);
    const written = await fs.readFile(outputPath, 'utf8');
    expect(written).toBe([
      'const int LED = 13;',
      'int sensor = A0;',
      '',
      'void setup() {',
      '  pinMode(LED, OUTPUT);',
      '}',
      '',
      'void loop() {',
      '  ESP_LOGI(TAG, "PIN 13, HIGH");;',
      '  delay(500);',
      '  ESP_LOGI(TAG, "PIN 13, LOW");;',
      '  int level = analogRead(sensor);',
      '}',
      ''
    ].join('\n'));
  });

  it('reports an unreadable sketch as a failure', async () => {
    const missing = path.join(workDir, 'missing.ino');
    const result = await createProbe().instrumentFile(missing, path.join(workDir, 'out.ino'));

    expect(result.success).toBe(false);
    expect(result.error).toContain(`Cannot read sketch ${missing}`);
  });

  it('verifies the sketch against the spec table', async () => {
    const probe = createProbe();
    const result = await probe.verifyFile(BLINK, BLINK_SPEC);

    expect(result.success).toBe(true);
    expect(probe.report(result.results)).toEqual([
      '[FOUND] digitalWrite(13) is present in the code.',
      '[FOUND] analogRead(A0) is present in the code.',
      '[MISSING] digitalRead(7) is NOT present in the code.',
      '[PRESENT] pinMode is used, but with different pin(s): 13'
    ]);
  });

  it('analyzes sources held in memory', () => {
    const probe = createProbe();
    const sketch = probe.analyzeSource('int PIN = 5;\nvoid loop() { digitalWrite(PIN, HIGH); }');

    expect(sketch.bindings.get('PIN')).toBe('5');
    expect(probe.instrumentSketch(sketch).source).toBe(
      'int PIN = 5;\nvoid loop() { ESP_LOGI(TAG, "PIN 5, HIGH");; }'
    );
  });

  it('grades the output of the harness run', async () => {
    // 伪造的构建脚本：把收到的源码原样作为模拟器输出
    await fs.writeFile(path.join(workDir, 'build.sh'), 'cat "$1" > output.txt\n');
    const result = await createProbe().grade(BLINK, {
      expectedOutput: 'PIN 13, HIGH\nPIN 13, LOW',
      weight: 3
    });

    expect(result.success).toBe(true);
    expect(result.comparison?.score).toBe(3);
    expect(result.run?.output.startsWith('//file: main.cpp\n')).toBe(true);
  });

  it('fails grading when an expected line is absent', async () => {
    await fs.writeFile(path.join(workDir, 'build.sh'), 'cat "$1" > output.txt\n');
    const result = await createProbe().grade(BLINK, { expectedOutput: 'PIN 12, HIGH' });

    expect(result.success).toBe(false);
    expect(result.comparison?.missingLines).toEqual(['PIN 12, HIGH']);
    expect(result.error).toBe('Expected output not found in actual output.');
  });
});
