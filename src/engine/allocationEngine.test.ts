import { describe, expect, it } from 'vitest';
import { Examiner } from '../models/Examiner';
import { LabSchedule, Session } from '../models/LabSchedule';
import {
    AllocationEngine,
    collectRegisterNumbers,
    countStudentsPerDate,
    countStudentsPerLab
} from './allocationEngine';
import { DEFAULT_CAPACITY_PROFILE, DEFAULT_LABS } from './capacity';
import { splitIntoSessions } from './sessionSplitter';

function makeRoster(count: number, prefix: string = 'REG'): string[] {
    return Array.from({ length: count }, (_, i) => `${prefix}${String(i + 1).padStart(4, '0')}`);
}

function makeDates(count: number): string[] {
    return Array.from({ length: count }, (_, i) => `${String(i + 1).padStart(2, '0')}-01-25`);
}

function slotSizes(schedule: LabSchedule): [number, number] {
    return [schedule.slots[0].registerNumbers.length, schedule.slots[1].registerNumbers.length];
}

describe('splitIntoSessions', () => {
    it('fills forenoon before afternoon', () => {
        const [forenoon, afternoon] = splitIntoSessions(makeRoster(20));
        expect(forenoon).toHaveLength(13);
        expect(afternoon).toEqual(makeRoster(20).slice(13));
    });

    it('leaves afternoon empty for small chunks', () => {
        expect(splitIntoSessions(['A', 'B'])).toEqual([['A', 'B'], []]);
    });
});

describe('AllocationEngine', () => {
    const engine = new AllocationEngine();

    it('fills one lab with 13 in the forenoon and 12 in the afternoon', () => {
        const schedules = engine.allocate(makeRoster(25), ['01-01-25'], DEFAULT_LABS);

        expect(schedules).toHaveLength(1);
        expect(schedules[0].date).toBe('01-01-25');
        expect(schedules[0].lab).toBe('Lab 1');
        expect(slotSizes(schedules[0])).toEqual([13, 12]);
        expect(schedules[0].slots[0]).toMatchObject({
            session: Session.FORENOON,
            time: '09:30 am - 12:30 pm',
            capacity: 13
        });
        expect(schedules[0].slots[1]).toMatchObject({
            session: Session.AFTERNOON,
            time: '01:30 pm - 04:30 pm',
            capacity: 12
        });
    });

    it('spills past 125 onto the next date in a partly filled lab', () => {
        const schedules = engine.allocate(makeRoster(130), ['01-01-25', '02-01-25'], DEFAULT_LABS);

        expect(schedules).toHaveLength(6);
        expect(schedules.slice(0, 5).map(s => [s.date, s.lab])).toEqual([
            ['01-01-25', 'Lab 1'],
            ['01-01-25', 'Lab 2'],
            ['01-01-25', 'Lab 3'],
            ['01-01-25', 'Lab 4'],
            ['01-01-25', 'Lab 5']
        ]);
        expect(schedules.slice(0, 5).map(slotSizes)).toEqual(Array(5).fill([13, 12]));
        expect(schedules[5].date).toBe('02-01-25');
        expect(schedules[5].lab).toBe('Lab 1');
        expect(schedules[5].slots[0].registerNumbers).toEqual(makeRoster(130).slice(125));
        expect(schedules[5].slots[1]).toEqual({
            time: '01:30 pm - 04:30 pm',
            session: Session.AFTERNOON,
            capacity: 0,
            registerNumbers: []
        });
    });

    it('keeps every capacity and ordering invariant across roster sizes', () => {
        const dates = makeDates(6);

        for (const count of [1, 12, 13, 14, 25, 26, 124, 125, 126, 250, 313, 600, 750]) {
            const roster = makeRoster(count);
            const schedules = engine.allocate(roster, dates, DEFAULT_LABS);

            expect(collectRegisterNumbers(schedules)).toEqual(roster);

            for (const schedule of schedules) {
                const [forenoon, afternoon] = slotSizes(schedule);
                expect(schedule.slots.map(slot => slot.session)).toEqual([Session.FORENOON, Session.AFTERNOON]);
                expect(forenoon + afternoon).toBeGreaterThan(0);
                expect(forenoon + afternoon).toBeLessThanOrEqual(25);
                expect(forenoon).toBeLessThanOrEqual(13);
                expect(afternoon).toBeLessThanOrEqual(12);
                if (afternoon > 0) {
                    expect(forenoon).toBe(13);
                }
            }

            for (const total of countStudentsPerDate(schedules).values()) {
                expect(total).toBeLessThanOrEqual(125);
            }
        }
    });

    it('stops at the first date once everyone is placed', () => {
        const schedules = engine.allocate(makeRoster(30), makeDates(3), DEFAULT_LABS);
        expect(schedules.map(s => s.date)).toEqual(['01-01-25', '01-01-25']);
        expect(countStudentsPerLab(schedules)).toEqual([25, 5]);
    });

    it('places only what the dates can hold', () => {
        const schedules = engine.allocate(makeRoster(300), makeDates(2), DEFAULT_LABS);
        expect(schedules).toHaveLength(10);
        expect(collectRegisterNumbers(schedules)).toEqual(makeRoster(250));
    });

    it('uses at most labsPerDay labs on a date', () => {
        const labs = [...DEFAULT_LABS, 'Lab 6'];
        const schedules = engine.allocate(makeRoster(150), makeDates(2), labs);

        expect(schedules.map(s => s.lab)).not.toContain('Lab 6');
        expect(schedules[5]).toMatchObject({ date: '02-01-25', lab: 'Lab 1' });
        expect(countStudentsPerDate(schedules)).toEqual(new Map([['01-01-25', 125], ['02-01-25', 25]]));
    });

    it('returns nothing without dates or labs', () => {
        expect(engine.allocate(makeRoster(10), [], DEFAULT_LABS)).toEqual([]);
        expect(engine.allocate(makeRoster(10), makeDates(1), [])).toEqual([]);
        expect(engine.allocate([], makeDates(1), DEFAULT_LABS)).toEqual([]);
    });

    it('cycles examiners by lab position, restarting each date', () => {
        const internal: Examiner[] = [{ id: 'I1', name: 'Dr. Nair' }, { id: 'I2', name: 'Dr. Pillai' }];
        const external: Examiner[] = [{ id: 'E1', name: 'Dr. Varma' }];

        const schedules = engine.allocate(makeRoster(130), makeDates(2), DEFAULT_LABS, {
            internalExaminers: internal,
            externalExaminers: external
        });

        expect(schedules.map(s => s.internalExaminer?.id)).toEqual(['I1', 'I2', 'I1', 'I2', 'I1', 'I1']);
        expect(schedules.map(s => s.externalExaminer?.id)).toEqual(['E1', 'E1', 'E1', 'E1', 'E1', 'E1']);
    });

    it('leaves examiner fields out when a pool is empty', () => {
        const [schedule] = engine.allocate(makeRoster(3), makeDates(1), DEFAULT_LABS, {
            externalExaminers: [{ id: 'E1', name: 'Dr. Varma' }]
        });
        expect(schedule).not.toHaveProperty('internalExaminer');
        expect(schedule.externalExaminer).toEqual({ id: 'E1', name: 'Dr. Varma' });
    });

    it('attributes each lab to the cohort of its register numbers', () => {
        const roster = makeRoster(30);
        const schedules = engine.allocate(roster, makeDates(1), DEFAULT_LABS, {
            semesters: [
                {
                    name: 'S4',
                    batches: [
                        { name: 'A', registerNumbers: roster.slice(0, 20) },
                        { name: 'B', registerNumbers: roster.slice(20) }
                    ]
                }
            ]
        });

        expect(schedules[0]).toMatchObject({ semester: 'S4', batch: 'S4A, S4B' });
        expect(schedules[1]).toMatchObject({ semester: 'S4', batch: 'S4B' });
    });

    it('tags schedules with the subject of their date', () => {
        const schedules = engine.allocate(makeRoster(130), makeDates(2), DEFAULT_LABS, {
            dateSubjects: new Map([['02-01-25', 'Networks Lab']])
        });
        expect(schedules[0]).not.toHaveProperty('subject');
        expect(schedules[5].subject).toBe('Networks Lab');
    });

    it('chunks each date from its own roster in date-keyed mode', () => {
        const schedules = engine.allocate(makeRoster(500), makeDates(3), DEFAULT_LABS, {
            dateRegisterNumbers: new Map([
                ['01-01-25', makeRoster(30, 'A')],
                ['02-01-25', makeRoster(5, 'B')]
            ])
        });

        expect(schedules.map(s => [s.date, s.lab])).toEqual([
            ['01-01-25', 'Lab 1'],
            ['01-01-25', 'Lab 2'],
            ['02-01-25', 'Lab 1']
        ]);
        expect(collectRegisterNumbers(schedules)).toEqual([...makeRoster(30, 'A'), ...makeRoster(5, 'B')]);
    });

    it('applies an alternate capacity profile', () => {
        const compact = new AllocationEngine({
            ...DEFAULT_CAPACITY_PROFILE,
            forenoonCapacity: 3,
            afternoonCapacity: 2,
            labsPerDay: 2,
            forenoonTime: '10:00 am - 12:00 pm'
        });

        const schedules = compact.allocate(makeRoster(12), makeDates(2), DEFAULT_LABS);

        expect(schedules.map(s => [s.date, s.lab])).toEqual([
            ['01-01-25', 'Lab 1'],
            ['01-01-25', 'Lab 2'],
            ['02-01-25', 'Lab 1']
        ]);
        expect(schedules.map(slotSizes)).toEqual([[3, 2], [3, 2], [2, 0]]);
        expect(schedules[0].slots[0].time).toBe('10:00 am - 12:00 pm');
    });
});
