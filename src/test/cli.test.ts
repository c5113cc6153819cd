import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import fs from 'fs';
import path from 'path';
import { CliIo, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, parseArgs, processHandlers, runCli } from '../cli.js';
import { createLogger } from '../logger.js';
import { VERSION } from '../version.js';
import {
    makeWorkspace,
    removeWorkspace,
    silentLogger,
    writeConfig,
    writeDailySeries,
} from './fixtures.js';

interface CapturedIo extends CliIo {
    out: string[];
    err: string[];
    verboseFlags: boolean[];
}

function captureIo(): CapturedIo {
    const out: string[] = [];
    const err: string[] = [];
    const verboseFlags: boolean[] = [];
    return {
        out,
        err,
        verboseFlags,
        stdout: line => out.push(line),
        stderr: line => err.push(line),
        createLogger: verbose => {
            verboseFlags.push(verbose);
            return silentLogger;
        },
    };
}

describe('parseArgs', () => {
    it('should read short and long options', () => {
        expect(parseArgs(['-c', 'a.ini', '-v'])).toEqual({
            configPath: 'a.ini',
            verbose: true,
            version: false,
            help: false,
            errors: [],
        });
        expect(parseArgs(['--config=b.ini', '--version']).configPath).toBe('b.ini');
        expect(parseArgs(['--config=b.ini', '--version']).version).toBe(true);
    });

    it('should report a missing config value and unknown arguments', () => {
        expect(parseArgs(['--config']).errors).toEqual(['--config requires a file path']);
        expect(parseArgs(['--fast']).errors).toEqual(['Unknown argument: --fast']);
    });
});

describe('runCli', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeWorkspace('bmorph-cli-');
    });

    afterEach(() => {
        removeWorkspace(dir);
    });

    it('should print the version and exit 0', () => {
        const io = captureIo();
        expect(runCli(['--version'], io)).toBe(EXIT_OK);
        expect(io.out).toEqual([`streamflow-bmorph ${VERSION}`]);
    });

    it('should exit 2 with usage when --config is missing', () => {
        const io = captureIo();
        expect(runCli([], io)).toBe(EXIT_USAGE);
        expect(io.err).toEqual(['--config is required', USAGE]);
    });

    it('should run the batch and print a summary', () => {
        const config = writeConfig(dir, { gcms: 'g1, g2' });
        writeDailySeries(path.join(dir, 'raw', 's1', 'vic_g1.csv'), '1998-01-01', '2002-12-31', (_, i) => 3 + (i % 4));
        writeDailySeries(path.join(dir, 'reference', 's1.csv'), '1998-01-01', '2002-12-31', (_, i) => 4 + (i % 3));

        const io = captureIo();
        expect(runCli(['--config', config, '--verbose'], io)).toBe(EXIT_OK);

        expect(io.out).toEqual(['1 written, 1 skipped, 2 total']);
        expect(io.verboseFlags).toEqual([true]);
        expect(fs.existsSync(path.join(dir, 'out', 's1', 'vic_g1.csv'))).toBe(true);
        expect(fs.existsSync(path.join(dir, 'out', 's1', 'vic_g2.csv'))).toBe(false);
    });

    it('should exit 1 before processing when a window is not a list', () => {
        const config = writeConfig(dir, { correctionWindow: '2000-01-01' });
        writeDailySeries(path.join(dir, 'raw', 's1', 'vic_g1.csv'), '1998-01-01', '2002-12-31', () => 1);
        writeDailySeries(path.join(dir, 'reference', 's1.csv'), '1998-01-01', '2002-12-31', () => 1);

        const io = captureIo();
        expect(runCli(['-c', config], io)).toBe(EXIT_FAILURE);
        expect(io.out).toEqual([]);
        expect(fs.existsSync(path.join(dir, 'out'))).toBe(false);
    });
});

describe('processHandlers', () => {
    it('should log an unhandled rejection and exit 1', () => {
        const logger = createLogger({ silent: true });
        const logged = jest.spyOn(logger, 'error');
        const exits: number[] = [];

        processHandlers(logger, code => exits.push(code)).unhandledRejection('connection lost');

        expect(logged).toHaveBeenCalledWith('Unhandled promise rejection', {
            reason: 'connection lost',
            stack: undefined,
        });
        expect(exits).toEqual([EXIT_FAILURE]);
    });

    it('should log an uncaught exception with its stack and exit 1', () => {
        const logger = createLogger({ silent: true });
        const logged = jest.spyOn(logger, 'error');
        const exits: number[] = [];
        const error = new Error('boom');

        processHandlers(logger, code => exits.push(code)).uncaughtException(error);

        expect(logged).toHaveBeenCalledWith('Uncaught exception', { error: 'boom', stack: error.stack });
        expect(exits).toEqual([EXIT_FAILURE]);
    });
});
