import { createOffering, resolveSlots, validateMaxCandidates } from '../validation';
import { InvalidParameterError } from '../errors';

describe('validation', () => {
  describe('createOffering', () => {
    it('should apply defaults for optional fields', () => {
      const offering = createOffering({
        name: 'Calculus',
        category: 'REQUIRED',
        sectionId: 'A',
        credits: 3,
      });

      expect(offering).toEqual({
        name: 'Calculus',
        category: 'REQUIRED',
        sectionId: 'A',
        credits: 3,
        priority: 3,
        timeSlots: [],
        mandatory: false,
        excluded: false,
        teacher: '',
        notes: '',
      });
    });

    it('should resolve slot notation and deduplicate slots', () => {
      const offering = createOffering({
        name: 'Physics',
        category: 'ELECTIVE',
        sectionId: 'B',
        credits: 2,
        timeSlots: ['Tue / 3,4 / Lab 1', { day: 'MON', period: 2 }, 'TUE/3'],
      });

      expect(offering.timeSlots).toEqual([
        { day: 'MON', period: 2 },
        { day: 'TUE', period: 3, room: 'Lab 1' },
        { day: 'TUE', period: 4, room: 'Lab 1' },
      ]);
    });

    it('should trim name and section id', () => {
      const offering = createOffering({ name: '  Chemistry ', category: 'REQUIRED', sectionId: ' 01 ', credits: 0 });
      expect(offering.name).toBe('Chemistry');
      expect(offering.sectionId).toBe('01');
    });

    it.each([0, 6, 2.5])('should reject priority %p', (priority) => {
      expect(() =>
        createOffering({ name: 'Art', category: 'ELECTIVE', sectionId: 'A', credits: 1, priority })
      ).toThrow(InvalidParameterError);
    });

    it.each([-1, 1.5])('should reject credits %p', (credits) => {
      expect(() =>
        createOffering({ name: 'Art', category: 'ELECTIVE', sectionId: 'A', credits })
      ).toThrow(InvalidParameterError);
    });

    it('should report the offending field path', () => {
      try {
        createOffering({ name: 'Art', category: 'ELECTIVE', sectionId: 'A', credits: 1, priority: 9 });
        throw new Error('expected createOffering to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidParameterError);
        if (error instanceof InvalidParameterError) {
          expect(error.details).toEqual([
            { path: 'priority', message: 'Number must be less than or equal to 5' },
          ]);
        }
      }
    });

    it('should reject an empty name', () => {
      expect(() => createOffering({ name: ' ', category: 'REQUIRED', sectionId: 'A', credits: 1 })).toThrow(
        InvalidParameterError
      );
    });
  });

  describe('resolveSlots', () => {
    it('should reject unparseable slot notation', () => {
      expect(() => resolveSlots(['Noday / 1'])).toThrow('Invalid time slot notation: "Noday / 1"');
    });

    it('should ignore blank notation', () => {
      expect(resolveSlots(['', { day: 'FRI', period: 1 }])).toEqual([{ day: 'FRI', period: 1 }]);
    });
  });

  describe('validateMaxCandidates', () => {
    it('should accept positive integers within the limit', () => {
      expect(validateMaxCandidates(10, 100)).toBe(10);
      expect(validateMaxCandidates(1)).toBe(1);
    });

    it.each([0, -3, 1.5, Number.NaN])('should reject %p', (value) => {
      expect(() => validateMaxCandidates(value)).toThrow(InvalidParameterError);
    });

    it('should reject values above the limit', () => {
      expect(() => validateMaxCandidates(101, 100)).toThrow('maxCandidates must not exceed 100');
    });
  });
});
