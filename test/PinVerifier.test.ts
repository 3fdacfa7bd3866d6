import { describe, it, expect } from 'vitest';
import { parseSource } from '../src/utils/SyntaxTree';
import { resolveBindings } from '../src/BindingResolver';
import {
  verify,
  coercePin,
  isValidPin,
  observedPins,
  formatResult,
  ANALOG_PINS,
  DIGITAL_PINS
} from '../src/PinVerifier';
import type { SpecEntry, VerificationResult } from '../src/PinVerifier';

function entry(functionName: string, expectedPin: number | string): SpecEntry {
  return { functionName, expectedPin, line: 2 };
}

function verifySource(source: string, spec: SpecEntry[]): VerificationResult[] {
  const tree = parseSource(source);
  return verify(tree.rootNode, resolveBindings(tree.rootNode), spec);
}

describe('coercePin', () => {
  it('turns integer text into a number', () => {
    expect(coercePin('13')).toBe(13);
    expect(coercePin(' 07 ')).toBe(7);
  });

  it('keeps symbolic names as strings', () => {
    expect(coercePin('A0')).toBe('A0');
    expect(coercePin('LED_BUILTIN')).toBe('LED_BUILTIN');
    expect(coercePin('0x0D')).toBe('0x0D');
  });
});

describe('pin namespaces', () => {
  it('contains both symbolic and numeric forms', () => {
    expect(ANALOG_PINS.has('A5')).toBe(true);
    expect(ANALOG_PINS.has(5)).toBe(true);
    expect(ANALOG_PINS.has(6)).toBe(false);
    expect(DIGITAL_PINS.has('D13')).toBe(true);
    expect(DIGITAL_PINS.has(13)).toBe(true);
    expect(DIGITAL_PINS.has(14)).toBe(false);
  });

  it('validates pins per function category', () => {
    expect(isValidPin('analogRead', 'A3')).toBe(true);
    expect(isValidPin('analogRead', 'A6')).toBe(false);
    expect(isValidPin('digitalWrite', 13)).toBe(true);
    expect(isValidPin('digitalRead', 'D14')).toBe(false);
    expect(isValidPin('analogWrite', 99)).toBe(true);
  });
});

describe('verify', () => {
  it('reports FOUND for an exact pin match', () => {
    const [result] = verifySource('void loop() { digitalWrite(5, HIGH); }', [entry('digitalWrite', 5)]);
    expect(result.status).toBe('FOUND');
    expect(result.observedPins).toEqual(['5']);
  });

  it('reports PRESENT_DIFFERENT with the observed pins', () => {
    const [result] = verifySource('void loop() { digitalWrite(6, HIGH); }', [entry('digitalWrite', 5)]);
    expect(result.status).toBe('PRESENT_DIFFERENT');
    expect(result.observedPins).toEqual(['6']);
  });

  it('reports MISSING when the function is never called', () => {
    const [result] = verifySource('void loop() { delay(10); }', [entry('digitalWrite', 5)]);
    expect(result.status).toBe('MISSING');
    expect(result.observedPins).toEqual([]);
  });

  it('resolves pins through variable bindings', () => {
    const source = 'const int SENSOR = A0;\nint LED = 9;\nvoid loop() { analogRead(SENSOR); digitalWrite(LED, LOW); }';
    const results = verifySource(source, [entry('analogRead', 'A0'), entry('digitalWrite', 9)]);
    expect(results.map((result) => result.status)).toEqual(['FOUND', 'FOUND']);
  });

  it('does not chase bindings past one hop', () => {
    const source = 'int A = 5;\nint B = A;\nvoid loop() { digitalWrite(B, LOW); }';
    const [result] = verifySource(source, [entry('digitalWrite', 5)]);
    expect(result.status).toBe('PRESENT_DIFFERENT');
    expect(result.observedPins).toEqual(['A']);
  });

  it('deduplicates and sorts observed pins', () => {
    const source = 'void loop() { digitalWrite(7, HIGH); digitalWrite(3, LOW); digitalWrite(07, HIGH); }';
    const tree = parseSource(source);
    expect(observedPins(tree.rootNode, new Map(), 'digitalWrite')).toEqual(['3', '7']);
  });

  it('ignores namespaces when classifying', () => {
    const [result] = verifySource('void loop() { digitalWrite(42, HIGH); }', [entry('digitalWrite', 42)]);
    expect(result.status).toBe('FOUND');
    expect(result.validPin).toBe(false);
  });

  it('counts a call without arguments as a use with an unknown pin', () => {
    const [result] = verifySource('void loop() { noInterrupts(); }', [entry('noInterrupts', 0)]);
    expect(result.status).toBe('PRESENT_DIFFERENT');
    expect(result.observedPins).toEqual(['None']);
  });

  it('returns one result per spec row in order', () => {
    const source = 'void loop() { digitalWrite(2, HIGH); }';
    const results = verifySource(source, [entry('digitalRead', 4), entry('digitalWrite', 2)]);
    expect(results.map((result) => result.entry.functionName)).toEqual(['digitalRead', 'digitalWrite']);
    expect(results.map((result) => result.status)).toEqual(['MISSING', 'FOUND']);
  });
});

describe('formatResult', () => {
  it('formats each status', () => {
    const source = 'void loop() { digitalWrite(6, HIGH); digitalWrite(7, LOW); }';
    const results = verifySource(source, [
      entry('digitalWrite', 6),
      entry('digitalWrite', 5),
      entry('analogRead', 'A0')
    ]);
    expect(results.map(formatResult)).toEqual([
      '[FOUND] digitalWrite(6) is present in the code.',
      '[PRESENT] digitalWrite is used, but with different pin(s): 6, 7',
      '[MISSING] analogRead(A0) is NOT present in the code.'
    ]);
  });
});
