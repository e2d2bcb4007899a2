import { describe, expect, it } from 'vitest';
import { extractRegisterNumbersFromText, scanRegisterNumbers } from './textExtractor';

describe('scanRegisterNumbers', () => {
    it('upper-cases and keeps first occurrences', () => {
        expect(scanRegisterNumbers('tve20cs001, TVE20CS002 and TVE20CS001')).toEqual(['TVE20CS001', 'TVE20CS002']);
    });

    it('ignores tokens embedded in longer words', () => {
        expect(scanRegisterNumbers('XTVE20CS0019 TVE20CS003')).toEqual(['TVE20CS003']);
    });
});

describe('extractRegisterNumbersFromText', () => {
    it('applies semester and batch hints', () => {
        const text = 'Semester: 5\nDivision B\nTVE20CS001 TVE20CS002\ntve20cs001';

        expect(extractRegisterNumbersFromText(text)).toEqual({
            semesters: [{ name: 'S5', batches: [{ name: 'B', registerNumbers: ['TVE20CS001', 'TVE20CS002'] }] }],
            registerNumbers: ['TVE20CS001', 'TVE20CS002']
        });
    });

    it('falls back to S1 batch A', () => {
        expect(extractRegisterNumbersFromText('TVE20CS010').semesters).toEqual([
            { name: 'S1', batches: [{ name: 'A', registerNumbers: ['TVE20CS010'] }] }
        ]);
    });

    it('finds no cohort without register numbers', () => {
        expect(extractRegisterNumbersFromText('Semester 3, batch C')).toEqual({ semesters: [], registerNumbers: [] });
    });
});
