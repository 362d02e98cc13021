import { describe, it, expect } from 'vitest';
import { decodeLine, parseNumber } from '../spectrum/decoder.js';

const SAMPLE = '2021-11-14,20:27:18,433006,435994,58.59,342414,-30.0,-60.0';

describe('parseNumber', () => {
  it('parses decimal and exponent forms', () => {
    expect(parseNumber(' -24.5 ')).toBe(-24.5);
    expect(parseNumber('1e3')).toBe(1000);
    expect(parseNumber('.5')).toBe(0.5);
    expect(parseNumber('+7.')).toBe(7);
  });

  it('accepts infinity and nan words', () => {
    expect(parseNumber('inf')).toBe(Infinity);
    expect(parseNumber('-Infinity')).toBe(-Infinity);
    expect(parseNumber('NaN')).toBeNaN();
  });

  it('rejects text that is not a number', () => {
    expect(parseNumber('')).toBeUndefined();
    expect(parseNumber('12abc')).toBeUndefined();
    expect(parseNumber('0x10')).toBeUndefined();
    expect(parseNumber('1,5')).toBeUndefined();
  });
});

describe('decodeLine', () => {
  it('expands dBm columns into consecutive sub-bins', () => {
    const bins = decodeLine(SAMPLE);
    expect([...bins.keys()]).toEqual(['433006', '433064']);

    const first = bins.get('433006');
    expect(first).toEqual({
      date: '2021-11-14',
      time: '20:27:18',
      frequencyStartRaw: '433006',
      frequencyStartHz: 433006,
      frequencyEndRaw: '58.59',
      binSizeRaw: '58.59',
      numSamplesRaw: '342414',
      dbmAverage: 0,
      dbmTotal: -30,
      dbmCount: 1,
    });
    expect(bins.get('433064')?.dbmTotal).toBe(-60);
  });

  it('yields start, start+step, start+2*step for every numeric sample', () => {
    const bins = decodeLine('2019-06-16,23:10:56,24000000,25000000,1000000.00,1,-24.14,nan,-20.5,-19');
    expect([...bins.keys()]).toEqual(['24000000', '26000000', '27000000']);
    expect([...bins.values()].map((b) => b.dbmTotal)).toEqual([-24.14, -20.5, -19]);
  });

  it('skips nan in any case and unparseable samples', () => {
    const bins = decodeLine('2019-06-16,23:10:56,24000000,25000000,1000000.00,1,nan,-24.14,NaN,abc,-20');
    expect([...bins.keys()]).toEqual(['25000000', '28000000']);
  });

  it('returns nothing for short or empty lines', () => {
    expect(decodeLine('').size).toBe(0);
    expect(decodeLine('2019-06-16,23:10:56,24000000,25000000,1000000.00,1').size).toBe(0);
  });

  it('returns nothing when every sample is nan', () => {
    expect(decodeLine('2019-06-16,23:10:56,24000000,25000000,1000000.00,1,nan,NAN').size).toBe(0);
  });

  it('treats a non-integer start frequency or a bad step as a malformed line', () => {
    expect(decodeLine('2019-06-16,23:10:56,24e6,25000000,1000000.00,1,-24').size).toBe(0);
    expect(decodeLine('2019-06-16,23:10:56,24000000,25000000,wide,1,-24').size).toBe(0);
    expect(decodeLine('2019-06-16,23:10:56,24000000,25000000,inf,1,-24').size).toBe(0);
  });

  it('truncates fractional frequencies toward zero', () => {
    const bins = decodeLine('d,t,100,101,0.75,1,-1,-2,-3');
    // 100, 100.75 -> 100, 101.5 -> 101
    expect([...bins.keys()]).toEqual(['100', '101']);
  });

  it('keeps the later sub-bin when a key repeats within one line', () => {
    const bins = decodeLine('d,t,1000,1000,0,1,-10,-20');
    expect(bins.size).toBe(1);
    expect(bins.get('1000')?.dbmTotal).toBe(-20);
    expect(bins.get('1000')?.dbmCount).toBe(1);
  });

  it('trims surrounding whitespace from every field', () => {
    const bins = decodeLine(' 2021-11-14 , 20:27:18 , 433006 , 435994 , 58.59 , 342414 , -30.5 ');
    const bin = bins.get('433006');
    expect(bin?.date).toBe('2021-11-14');
    expect(bin?.time).toBe('20:27:18');
    expect(bin?.binSizeRaw).toBe('58.59');
    expect(bin?.dbmTotal).toBe(-30.5);
  });
});
