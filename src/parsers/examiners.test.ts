import { describe, expect, it } from 'vitest';
import { parseExaminer } from './examiners';

describe('parseExaminer', () => {
    it('splits on the first separator', () => {
        expect(parseExaminer('E7: Dr. Iyer')).toEqual({ id: 'E7', name: 'Dr. Iyer' });
        expect(parseExaminer('E8: Prof: Menon')).toEqual({ id: 'E8', name: 'Prof: Menon' });
    });

    it('rejects text without a separator', () => {
        expect(() => parseExaminer('Dr. Iyer')).toThrow('Invalid examiner format: Dr. Iyer');
    });
});
