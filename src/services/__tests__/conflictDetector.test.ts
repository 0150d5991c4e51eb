import { buildSlotMap, detectConflicts } from '../conflictDetector';
import { Offering } from '../../types';
import { makeOffering } from './helpers';

function summarize(tuple: Offering[]): Array<{ slot: string; names: string[] }> {
  return detectConflicts(tuple).map((conflict) => ({
    slot: `${conflict.day}-${conflict.period}`,
    names: conflict.offerings.map((o) => o.name),
  }));
}

describe('conflictDetector', () => {
  it('should report no conflicts for disjoint offerings', () => {
    expect(detectConflicts([makeOffering('A', '1', ['Mon/1']), makeOffering('B', '1', ['Tue/2'])])).toEqual([]);
  });

  it('should report a single shared slot', () => {
    expect(summarize([makeOffering('A', '1', ['Mon/1']), makeOffering('B', '1', ['Mon/1'])])).toEqual([
      { slot: 'MON-1', names: ['A', 'B'] },
    ]);
  });

  it('should count colliding slots rather than colliding pairs', () => {
    const tuple = [
      makeOffering('A', '1', ['Mon/1']),
      makeOffering('B', '1', ['Mon/1']),
      makeOffering('C', '1', ['Mon/1']),
    ];
    const conflicts = detectConflicts(tuple);

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].offerings.map((o) => o.name)).toEqual(['A', 'B', 'C']);
  });

  it('should order conflicts by day then period', () => {
    const tuple = [
      makeOffering('A', '1', ['Wed/2', 'Mon/3', 'Mon/1']),
      makeOffering('B', '1', ['Mon/1', 'Wed/2', 'Mon/3']),
    ];
    expect(summarize(tuple).map((c) => c.slot)).toEqual(['MON-1', 'MON-3', 'WED-2']);
  });

  it('should treat the same period on another day as free', () => {
    expect(detectConflicts([makeOffering('A', '1', ['Mon/4']), makeOffering('B', '1', ['Thu/4'])])).toEqual([]);
  });

  it('should ignore rooms when matching slots', () => {
    const tuple = [makeOffering('A', '1', ['Fri/6/B 312']), makeOffering('B', '1', ['Fri/6/C 101'])];
    expect(summarize(tuple)).toEqual([{ slot: 'FRI-6', names: ['A', 'B'] }]);
  });

  it('should treat an offering without slots as conflict-free', () => {
    const tuple = [makeOffering('A', '1'), makeOffering('B', '1', ['Mon/1'])];
    expect(detectConflicts(tuple)).toEqual([]);
    expect(buildSlotMap(tuple).size).toBe(1);
  });

  it('should not count a slot repeated inside one offering as a conflict', () => {
    const offering: Offering = {
      ...makeOffering('A', '1'),
      timeSlots: [
        { day: 'MON', period: 1 },
        { day: 'MON', period: 1 },
      ],
    };
    expect(detectConflicts([offering])).toEqual([]);
  });

  it('should be independent of how often it is called', () => {
    const tuple = [makeOffering('A', '1', ['Mon/1', 'Tue/1']), makeOffering('B', '1', ['Mon/1', 'Tue/1'])];
    expect(summarize(tuple)).toEqual(summarize(tuple));
    expect(summarize(tuple)).toHaveLength(2);
  });
});
