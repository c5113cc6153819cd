import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SeriesFormatError } from '../errors.js';
import { parseSeriesText, readRawSeries, readReferenceSeries } from '../series/series-reader.js';

const SAMPLE = [
    '# site: s1',
    '# model: vic',
    'date,streamflow',
    '2000-01-01,1.5',
    '2000-01-02,2.25',
    '',
].join('\n');

describe('Series reader', () => {
    it('should split metadata from the series', () => {
        const { series, metadata } = parseSeriesText(SAMPLE);

        expect(metadata).toEqual(['# site: s1', '# model: vic']);
        expect(series.valueArray()).toEqual([1.5, 2.25]);
        expect(series.timeAt(1).toISODate()).toBe('2000-01-02');
    });

    it('should accept files without metadata or with CRLF endings', () => {
        const { series, metadata } = parseSeriesText('date,flow\r\n2000-01-01,3\r\n2000-01-02,4\r\n');
        expect(metadata).toEqual([]);
        expect(series.valueArray()).toEqual([3, 4]);
    });

    it('should name the file and line of a bad value', () => {
        const text = ['# meta', 'date,streamflow', '2000-01-01,1', '2000-01-02,abc'].join('\n');
        expect(() => parseSeriesText(text, 'raw.csv')).toThrow('Invalid value "abc" (raw.csv:4)');
    });

    it('should reject an empty value', () => {
        expect(() => parseSeriesText('date,streamflow\n2000-01-01,\n')).toThrow(SeriesFormatError);
    });

    it('should reject an unparseable timestamp', () => {
        expect(() => parseSeriesText('date,streamflow\nyesterday,1\n', 'ref.csv'))
            .toThrow('Unparseable timestamp "yesterday" (ref.csv:2)');
    });

    it('should reject out-of-order rows', () => {
        const text = 'date,streamflow\n2000-01-02,1\n2000-01-01,2\n';
        expect(() => parseSeriesText(text, 'raw.csv')).toThrow(SeriesFormatError);
    });

    it('should reject a file with no header', () => {
        expect(() => parseSeriesText('# only metadata\n')).toThrow('Missing header row');
    });

    describe('files', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bmorph-reader-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('should read raw and reference files from disk', () => {
            const file = path.join(dir, 'series.csv');
            fs.writeFileSync(file, SAMPLE);

            expect(readRawSeries(file).metadata).toHaveLength(2);
            expect(readReferenceSeries(file).length).toBe(2);
        });
    });
});
