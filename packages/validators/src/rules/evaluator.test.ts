import { describe, it, expect } from 'vitest';
import { parseXmlDocument } from '@einvoice-fr/shared';
import { evaluate, holds, locateAll, locateRoot, select } from './evaluator.js';

const root = parseXmlDocument(`
  <Root>
    <Line><Amount>10.00</Amount><Code>S</Code></Line>
    <Line><Amount>5.50</Amount><Code>Z</Code><Parent>1</Parent></Line>
    <Extra><Amount>1.00</Amount></Extra>
    <Empty/>
  </Root>
`);

describe('locateAll', () => {
  it('should number repeated siblings', () => {
    expect(locateAll(locateRoot(root), 'Line').map((located) => located.location)).toEqual([
      '/Root/Line[1]',
      '/Root/Line[2]',
    ]);
  });

  it('should follow alternatives in document order', () => {
    expect(locateAll(locateRoot(root), 'Extra|Line/Amount').map((located) => located.location)).toEqual([
      '/Root/Line[1]/Amount',
      '/Root/Line[2]/Amount',
      '/Root/Extra/Amount',
    ]);
  });

  it('should return the start for an empty path', () => {
    expect(locateAll(locateRoot(root), '')).toEqual([{ element: root, location: '/Root' }]);
  });
});

describe('select', () => {
  it('should return nothing for a missing step', () => {
    expect(select(root, 'Line/Missing')).toEqual([]);
  });
});

describe('evaluate', () => {
  it('should read a path and fall back to its default', () => {
    expect(evaluate({ path: 'Extra/Amount' }, root)).toBe('1.00');
    expect(evaluate({ path: 'Missing', default: '0' }, root)).toBe('0');
    expect(evaluate({ path: 'Empty', default: '2' }, root)).toBe('2');
  });

  it('should not treat text as a number', () => {
    expect(evaluate({ path: 'Line/Code' }, root)).toBeUndefined();
    expect(evaluate({ sum: 'Line/Code' }, root)).toBeUndefined();
  });

  it('should sum every match', () => {
    expect(evaluate({ sum: 'Line/Amount' }, root)).toBe('15.50');
    expect(evaluate({ sum: 'Missing' }, root)).toBe('0');
  });

  it('should skip excluded items in a sum', () => {
    expect(evaluate({ sum: { each: 'Line', of: 'Amount', unless: 'Parent' } }, root)).toBe('10.00');
  });

  it('should combine operands', () => {
    expect(evaluate({ add: [{ path: 'Line/Amount' }, { value: '1' }] }, root)).toBe('11.00');
    expect(evaluate({ subtract: [{ sum: 'Line/Amount' }, { path: 'Extra/Amount' }] }, root)).toBe('14.50');
    expect(evaluate({ percentage: [{ path: 'Line/Amount' }, { value: '5.5' }] }, root)).toBe('0.55');
  });

  it('should give up when an operand is missing', () => {
    expect(evaluate({ add: [{ path: 'Line/Amount' }, { path: 'Missing' }] }, root)).toBeUndefined();
    expect(evaluate({ subtract: [{ path: 'Missing' }, { value: '1' }] }, root)).toBeUndefined();
  });
});

describe('holds', () => {
  it('should require content for exists', () => {
    expect(holds({ type: 'exists', path: 'Extra/Amount' }, root)).toBe(true);
    expect(holds({ type: 'exists', path: 'Empty' }, root)).toBe(false);
    expect(holds({ type: 'exists', path: 'Missing' }, root)).toBe(false);
  });

  it('should compare text', () => {
    expect(holds({ type: 'textEquals', path: 'Line/Code', value: 'S' }, root)).toBe(true);
    expect(holds({ type: 'oneOf', path: 'Line/Code', values: ['Z', 'E'] }, root)).toBe(false);
    expect(holds({ type: 'pattern', path: 'Line/Code', pattern: '^[SZ]$' }, root)).toBe(true);
  });

  it('should let code checks pass on absent values', () => {
    expect(holds({ type: 'oneOf', path: 'Missing', values: ['Z'] }, root)).toBe(true);
    expect(holds({ type: 'pattern', path: 'Missing', pattern: '^\\d+$' }, root)).toBe(true);
  });

  it('should compare amounts whatever their scale', () => {
    expect(holds({ type: 'equals', left: { sum: 'Line/Amount' }, right: { value: '15.5' } }, root)).toBe(true);
    expect(holds({ type: 'equals', left: { path: 'Extra/Amount' }, right: { value: '2' } }, root)).toBe(false);
    expect(holds({ type: 'greaterThan', left: { path: 'Extra/Amount' }, right: { value: '0' } }, root)).toBe(true);
    expect(holds({ type: 'greaterThan', left: { path: 'Extra/Amount' }, right: { value: '1' } }, root)).toBe(false);
  });

  it('should not fire arithmetic checks on missing operands', () => {
    expect(holds({ type: 'equals', left: { path: 'Missing' }, right: { value: '2' } }, root)).toBe(true);
  });

  it('should combine assertions', () => {
    const zeroRated = { type: 'textEquals', path: 'Code', value: 'Z' } as const;

    expect(holds({ type: 'some', path: 'Line', where: zeroRated }, root)).toBe(true);
    expect(holds({ type: 'all', of: [zeroRated] }, root)).toBe(false);
    expect(holds({ type: 'any', of: [zeroRated, { type: 'exists', path: 'Extra' }] }, root)).toBe(true);
    expect(holds({ type: 'not', assertion: { type: 'exists', path: 'Extra' } }, root)).toBe(false);
    expect(holds({ type: 'when', if: { type: 'exists', path: 'Missing' }, then: zeroRated }, root)).toBe(true);
    expect(holds({ type: 'when', if: { type: 'exists', path: 'Line' }, then: zeroRated }, root)).toBe(false);
  });
});
