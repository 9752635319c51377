import { describe, expect, it } from 'vitest';
import { groupByDate, partitionScreenshots } from '../../main/features/screenshots/date-grouper';
import { toScreenshotFile } from '../../main/features/screenshots/filename-parser';

const file = (name: string) => toScreenshotFile(`/in/${name}`);

describe('groupByDate', () => {
    const inputs = [
        file('Screenshot_2024-01-06-08-00-00-1.png'),
        file('Screenshot_2024-01-05-12-30-00-5.png'),
        file('random.png'),
        file('Screenshot_2024-01-05-09-15-00-2.png'),
        file('Screenshot_2023-12-31-23-59-59-9.jpg'),
        file('Screenshot_2024-01-06-07-00-00-3.png')
    ];

    it('creates one group per date in ascending order', () => {
        const groups = groupByDate(inputs);
        expect(groups.map(g => g.date)).toEqual(['2023-12-31', '2024-01-05', '2024-01-06']);
    });

    it('orders images within a group by capture time', () => {
        const groups = groupByDate(inputs);
        expect(groups[1].images.map(i => i.filename)).toEqual([
            'Screenshot_2024-01-05-09-15-00-2.png',
            'Screenshot_2024-01-05-12-30-00-5.png'
        ]);
        expect(groups[2].images.map(i => i.filename)).toEqual([
            'Screenshot_2024-01-06-07-00-00-3.png',
            'Screenshot_2024-01-06-08-00-00-1.png'
        ]);
    });

    it('produces disjoint groups whose union is the dated input', () => {
        const groups = groupByDate(inputs);
        const grouped = groups.flatMap(g => g.images.map(i => i.path));

        expect(new Set(grouped).size).toBe(grouped.length);
        expect([...grouped].sort()).toEqual(
            inputs.filter(f => f.timestamp !== null).map(f => f.path).sort()
        );
    });

    it('excludes files without a timestamp', () => {
        const groups = groupByDate([file('random.png')]);
        expect(groups).toEqual([]);
    });

    it('breaks identical timestamps by filename', () => {
        const groups = groupByDate([
            file('Screenshot_2024-01-05-10-00-00-1.png'),
            file('Screenshot_2024-01-05-10-00-00-1.jpg')
        ]);
        expect(groups[0].images.map(i => i.filename)).toEqual([
            'Screenshot_2024-01-05-10-00-00-1.jpg',
            'Screenshot_2024-01-05-10-00-00-1.png'
        ]);
    });

    it('does not depend on input order', () => {
        const reversed = [...inputs].reverse();
        expect(groupByDate(reversed)).toEqual(groupByDate(inputs));
    });
});

describe('partitionScreenshots', () => {
    it('separates dated files from unrecognized ones', () => {
        const { parsed, skipped } = partitionScreenshots([
            file('Screenshot_2024-01-05-10-00-00-1.png'),
            file('notes.png')
        ]);
        expect(parsed.map(f => f.filename)).toEqual(['Screenshot_2024-01-05-10-00-00-1.png']);
        expect(skipped.map(f => f.filename)).toEqual(['notes.png']);
    });
});
