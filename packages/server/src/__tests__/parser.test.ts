import { describe, it, expect } from 'vitest';
import { BinAccumulator, SweepAccumulator } from '../spectrum/parser.js';

const LINE_A = '2021-11-14,20:27:18,433006,435994,58.59,342414,-30.0,-60.0';
const LINE_B = '2021-11-14,20:28:18,433006,435994,58.59,342414,-60.0,-30.0';

function summary(bins: { frequencyStartRaw: string; dbmAverage: number }[]) {
  return bins.map((b) => [b.frequencyStartRaw, b.dbmAverage]);
}

describe('BinAccumulator', () => {
  it('averages repeated frequencies across lines', () => {
    const parser = new BinAccumulator();
    parser.addLine(LINE_A);
    parser.addLine(LINE_B);
    const bins = parser.finalize();
    expect(summary(bins)).toEqual([['433006', -45], ['433064', -45]]);
    expect(bins.map((b) => b.dbmCount)).toEqual([2, 2]);
    expect(bins.map((b) => b.dbmTotal)).toEqual([-90, -90]);
  });

  it('recovers values from lines with disjoint nan positions', () => {
    const parser = new BinAccumulator();
    parser.addLine('2021-11-14,20:27:18,433006,435994,58.59,342414,-27.70,nan');
    parser.addLine('2021-11-14,20:28:18,433006,435994,58.59,342414,nan,-26.70');
    expect(summary(parser.finalize())).toEqual([['433006', -27.7], ['433064', -26.7]]);
  });

  it('keeps metadata of the first line that introduced a frequency', () => {
    const parser = new BinAccumulator();
    parser.addLine(LINE_A);
    parser.addLine(LINE_B);
    expect(parser.finalize()[0].time).toBe('20:27:18');
  });

  it('ignores empty, short and all-nan lines', () => {
    const parser = new BinAccumulator();
    parser.addLine('');
    parser.addLine('2021-11-14,20:27:18,433006');
    parser.addLine('2021-11-14,20:27:18,433006,435994,58.59,342414,nan,nan');
    expect(parser.finalize()).toEqual([]);
    expect(parser.size).toBe(0);
  });

  it('sorts by numeric frequency rather than insertion order', () => {
    const parser = new BinAccumulator();
    parser.addLine('2019-06-16,23:10:56,900000000,901000000,1000000,1,-50');
    parser.addLine('2019-06-16,23:10:56,24000000,25000000,1000000,1,-40');
    parser.addLine('2019-06-16,23:10:56,100000000,101000000,1000000,1,-45');
    expect(parser.finalize().map((b) => b.frequencyStartHz)).toEqual([24000000, 100000000, 900000000]);
  });

  it('returns the same averages when finalized twice', () => {
    const parser = new BinAccumulator();
    parser.addLine(LINE_A);
    parser.addLine(LINE_B);
    const first = summary(parser.finalize());
    expect(summary(parser.finalize())).toEqual(first);
  });

  it('can keep accumulating after a finalize', () => {
    const parser = new BinAccumulator();
    parser.addLine(LINE_A);
    parser.finalize();
    parser.addLine(LINE_B);
    expect(summary(parser.finalize())).toEqual([['433006', -45], ['433064', -45]]);
  });

  it('hands out copies that do not share state with the accumulator', () => {
    const parser = new BinAccumulator();
    parser.addLine('2021-11-14,20:27:18,433006,435994,58.59,342414,-30.0');
    const first = parser.finalize();
    first[0].dbmTotal = 1000;
    first[0].dbmAverage = 1000;

    parser.addLine('2021-11-14,20:28:18,433006,435994,58.59,342414,-60.0');
    const second = parser.finalize();
    expect(second[0].dbmAverage).toBe(-45);
    expect(second[0]).not.toBe(first[0]);
    expect(first[0].dbmCount).toBe(1);
  });
});

describe('SweepAccumulator', () => {
  it('labels a sweep with the date and time of its first line', () => {
    const parser = new SweepAccumulator();
    parser.addLine(LINE_A);
    const sweeps = parser.finalize();
    expect(sweeps).toHaveLength(1);
    expect(sweeps[0].label).toBe('2021-11-14 20:27:18');
    expect(summary(sweeps[0].bins)).toEqual([['433006', -30], ['433064', -60]]);
  });

  it('returns no sweeps without input', () => {
    expect(new SweepAccumulator().finalize()).toEqual([]);
  });

  it('starts a new sweep when the timestamp changes', () => {
    const parser = new SweepAccumulator();
    parser.addLine('2021-11-14,20:27:18,100,200,100,1,-10,-11');
    parser.addLine('2021-11-14,20:27:18,300,400,100,1,-12,-13');
    parser.addLine('2021-11-14,20:28:18,100,200,100,1,-20,-21');
    const sweeps = parser.finalize();
    expect(sweeps.map((s) => s.label)).toEqual(['2021-11-14 20:27:18', '2021-11-14 20:28:18']);
    expect(sweeps[0].bins.map((b) => b.frequencyStartHz)).toEqual([100, 200, 300, 400]);
    expect(summary(sweeps[1].bins)).toEqual([['100', -20], ['200', -21]]);
    expect(parser.sweepCount).toBe(2);
  });

  it('averages repeated frequencies inside one sweep only', () => {
    const parser = new SweepAccumulator();
    parser.addLine('2021-11-14,20:27:18,100,200,100,1,-10');
    parser.addLine('2021-11-14,20:27:18,100,200,100,1,-20');
    parser.addLine('2021-11-14,20:28:18,100,200,100,1,-40');
    const sweeps = parser.finalize();
    expect(summary(sweeps[0].bins)).toEqual([['100', -15]]);
    expect(summary(sweeps[1].bins)).toEqual([['100', -40]]);
  });

  it('keeps sweeps in order of first appearance without sorting by time', () => {
    const parser = new SweepAccumulator();
    parser.addLine('2021-11-14,20:29:00,100,200,100,1,-1');
    parser.addLine('2021-11-14,20:27:00,100,200,100,1,-2');
    parser.addLine('2021-11-14,20:29:00,100,200,100,1,-3');
    expect(parser.finalize().map((s) => s.label)).toEqual([
      '2021-11-14 20:29:00',
      '2021-11-14 20:27:00',
      '2021-11-14 20:29:00',
    ]);
  });

  it('ignores lines without samples, even with a new timestamp', () => {
    const parser = new SweepAccumulator();
    parser.addLine('2021-11-14,20:27:18,100,200,100,1,-10');
    parser.addLine('2021-11-14,20:30:00,100,200,100,1,nan');
    parser.addLine('short,line');
    parser.addLine('2021-11-14,20:27:18,100,200,100,1,-30');
    const sweeps = parser.finalize();
    expect(sweeps).toHaveLength(1);
    expect(summary(sweeps[0].bins)).toEqual([['100', -20]]);
  });

  it('keeps sweep totals intact when a returned record is modified', () => {
    const parser = new SweepAccumulator();
    parser.addLine(LINE_A);
    const first = parser.finalize();
    first[0].bins[0].dbmTotal = 0;
    first[0].bins[0].dbmAverage = 0;

    const second = parser.finalize();
    expect(second[0].bins[0].dbmAverage).toBe(-30);
    expect(second[0].bins[0]).not.toBe(first[0].bins[0]);
  });

  it('returns the same sweeps when finalized twice', () => {
    const parser = new SweepAccumulator();
    parser.addLine(LINE_A);
    parser.addLine(LINE_B);
    expect(parser.finalize()).toHaveLength(2);
    expect(parser.finalize()).toHaveLength(2);
  });
});
