import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { ControlPlaneCLI, formatAuditEntry, formatRun, parseArgs } from '../src/cli';
import { ControlPlane } from '../src/control_plane';
import { InvalidChannelError } from '../src/errors';
import { loadProgram, parseProgram, runProgram } from '../src/program';
import type { AuditEntry } from '../src/types';
import { ScriptedBackend } from './helpers/scripted_backend';

const BELL_PROGRAM = path.join(__dirname, '..', 'programs', 'logical_bell.json');
const MODULAR_PROGRAM = path.join(__dirname, '..', 'programs', 'modular_cnot.json');

describe('program files', () => {
    test('fills in defaults', () => {
        const program = parseProgram({
            operations: [{ kind: 'single', gate: 'X', channels: [0] }],
            measurements: [{ kind: 'physical', channels: [0] }, { kind: 'logical', group: [0, 1, 2] }],
        });
        assert.deepEqual(program.calibrate, []);
        assert.deepEqual(program.measurements, [
            { kind: 'physical', channels: [0], shots: 1, repetition: 1 },
            { kind: 'logical', group: [0, 1, 2], shots: 1 },
        ]);
    });

    test('rejects malformed programs with the offending path', () => {
        assert.throws(() => parseProgram({ operations: [{ kind: 'two', gate: 'CZ', channels: [0] }] }), /INVALID_PROGRAM: operations\.0\.channels/);
        assert.throws(() => parseProgram({ measurements: [{ kind: 'physical', channels: [0], shots: 0 }] }), /INVALID_PROGRAM/);
        assert.throws(() => parseProgram({ calibrate: 'some' }), /INVALID_PROGRAM/);
    });

    test('reports an unreadable file', () => {
        assert.throws(() => loadProgram(path.join(__dirname, 'no-such-program.json')), /INVALID_PROGRAM: cannot read/);
    });

    test('runs the bundled program end to end', async () => {
        const program = loadProgram(BELL_PROGRAM);
        const backend = new ScriptedBackend({ defaultRead: 1 });
        const plane = new ControlPlane({ backend, config: { channelCount: program.channels ?? 9 } });
        const run = await runProgram(plane, program);

        assert.deepEqual(run.calibrated, [0, 1, 2, 3, 4, 5, 6, 7, 8]);
        assert.deepEqual(run.dispatch.map(d => (d.ok ? d.value.status : 'failed')), ['executed', 'executed', 'executed']);
        assert.deepEqual(formatRun(run).slice(4), [
            'Channel 0: 0=0 1=10',
            'Channel 3: 0=0 1=10',
            'Logical [0,1,2]: 0=0 1=10',
            'Logical [3,4,5]: 0=0 1=10',
        ]);
        // 9 calibrations, H, CNOT, X on 3 channels, 3 measurements
        assert.equal(plane.audit.size, 17);
        plane.close();
    });
});

describe('modular program files', () => {
    test('runs the bundled modular program end to end', async () => {
        const program = loadProgram(MODULAR_PROGRAM);
        const backend = new ScriptedBackend({ defaultRead: 1 });
        const plane = new ControlPlane({ backend, config: { moduleSizes: program.modules } });
        const run = await runProgram(plane, program);

        assert.equal(run.calibrated.length, 12);
        assert.deepEqual(run.dispatch.map(d => (d.ok ? d.value.executed : 'failed')), [[0], [0, 4]]);
        assert.deepEqual(backend.callsOf('sendTwoChannelPulse'), [{ method: 'sendTwoChannelPulse', channels: [0, 4], gate: 'CNOT' }]);
        assert.deepEqual(formatRun(run).slice(3), ['Logical [0,1,2]: 0=0 1=10']);
        // 12 calibrations, H, CNOT, one logical measurement
        assert.equal(plane.audit.size, 15);
        plane.close();
    });

    test('a module-local channel past the module end stops the run before dispatch', async () => {
        const program = parseProgram({
            modules: [2, 2],
            operations: [
                { kind: 'single', gate: 'X', module: 0, channels: [1] },
                { kind: 'single', gate: 'X', module: 1, channels: [2] },
            ],
        });
        const plane = new ControlPlane({ backend: new ScriptedBackend(), config: { moduleSizes: program.modules } });
        await assert.rejects(runProgram(plane, program), InvalidChannelError);
        assert.equal(plane.queue.length, 0);
        plane.close();
    });

    test('rejects a cross operation without both addresses', () => {
        assert.throws(
            () => parseProgram({ operations: [{ kind: 'cross', gate: 'CNOT', a: { module: 0, channel: 0 } }] }),
            /INVALID_PROGRAM: operations\.0\.b/
        );
    });
});

describe('cli helpers', () => {
    test('parseArgs splits positionals and flags', () => {
        const parsed = parseArgs(['prog.json', '--seed', '7', '--json']);
        assert.deepEqual(parsed.positional, ['prog.json']);
        assert.equal(parsed.flags.get('seed'), '7');
        assert.equal(parsed.flags.get('json'), true);
    });

    test('parseArgs never lets a boolean flag take the next positional', () => {
        const parsed = parseArgs(['--json', 'prog.json', '--seed', '7']);
        assert.deepEqual(parsed.positional, ['prog.json']);
        assert.equal(parsed.flags.get('json'), true);
        assert.equal(parsed.flags.get('seed'), '7');
    });

    test('qctl audit on a missing file fails without creating it', async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'qctl-cli-'));
        const missing = path.join(dir, 'typo.jsonl');
        try {
            assert.equal(await new ControlPlaneCLI().run(['node', 'qctl', 'audit', missing]), 1);
            assert.equal(fs.existsSync(missing), false);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    test('formatAuditEntry prints one line per entry', () => {
        const entry: AuditEntry = {
            seq: 2,
            id: 'entry-2',
            timestamp: '2026-01-01T00:00:00.000Z',
            action: 'gate',
            outcome: 'failed',
            channels: [1],
            gate: 'X',
            error: 'boom',
        };
        assert.equal(formatAuditEntry(entry), '#2 2026-01-01T00:00:00.000Z gate failed channels=[1] gate=X error="boom"');
    });
});
