#!/usr/bin/env node
/**
 * CLI Entry Point for the control plane (qctl)
 */

import * as fs from 'fs';
import { JsonlAuditSink, readJsonlAudit } from './audit';
import { SimulatedBackend } from './backends/simulated_backend';
import { loadControlPlaneConfig } from './config';
import { ControlPlane } from './control_plane';
import { describeError } from './errors';
import { loadProgram, runProgram } from './program';
import type { ProgramRun } from './program';
import type { AuditEntry, AuditSink } from './types';

interface ParsedArgs {
    positional: string[];
    flags: Map<string, string | true>;
}

// Flags that never take a value
const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['json', 'help']);

export function parseArgs(args: string[]): ParsedArgs {
    const positional: string[] = [];
    const flags = new Map<string, string | true>();
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a.startsWith('--')) {
            const name = a.slice(2);
            const next = args[i + 1];
            if (!BOOLEAN_FLAGS.has(name) && next !== undefined && !next.startsWith('--')) {
                flags.set(name, next);
                i++;
            } else {
                flags.set(name, true);
            }
        } else {
            positional.push(a);
        }
    }
    return { positional, flags };
}

export function formatRun(run: ProgramRun): string[] {
    const lines: string[] = [];
    lines.push(`Calibrated: ${run.calibrated.length} channel(s)`);
    run.dispatch.forEach((d, i) => {
        if (d.ok) {
            const skipped = d.value.skipped.length ? ` skipped=[${d.value.skipped.join(',')}]` : '';
            lines.push(`Op ${i} ${d.value.gate}: ${d.value.status} executed=[${d.value.executed.join(',')}]${skipped}`);
        } else {
            lines.push(`Op ${i}: FAILED ${d.error.message}`);
        }
    });
    for (const m of run.measurements) {
        if (m.kind === 'physical') {
            for (const c of m.result.channels) {
                lines.push(`Channel ${c.channel}: 0=${c.counts[0]} 1=${c.counts[1]}`);
            }
            for (const ch of m.result.skipped) lines.push(`Channel ${ch}: skipped (uncalibrated)`);
        } else {
            const label = `Logical [${m.result.group.join(',')}]`;
            lines.push(m.result.skipped
                ? `${label}: skipped (uncalibrated ${m.result.uncalibrated.join(',')})`
                : `${label}: 0=${m.result.counts[0]} 1=${m.result.counts[1]}`);
        }
    }
    return lines;
}

export function formatAuditEntry(e: AuditEntry): string {
    const gate = e.gate ? ` gate=${e.gate}` : '';
    const shots = e.shots !== undefined ? ` shots=${e.shots}` : '';
    const rep = e.repetition !== undefined ? ` repetition=${e.repetition}` : '';
    const err = e.error ? ` error="${e.error}"` : '';
    return `#${e.seq} ${e.timestamp} ${e.action} ${e.outcome} channels=[${e.channels.join(',')}]${gate}${shots}${rep}${err}`;
}

export class ControlPlaneCLI {
    async run(argv: string[]): Promise<number> {
        const command = argv[2] || 'help';
        const args = parseArgs(argv.slice(3));

        switch (command) {
            case 'run':
                return this.runProgramFile(args);
            case 'audit':
                return this.runAudit(args);
            case 'help':
                this.showHelp();
                return 0;
            default:
                console.error(`Unknown command: ${command}`);
                this.showHelp();
                return 1;
        }
    }

    private async runProgramFile(args: ParsedArgs): Promise<number> {
        const file = args.positional[0];
        if (!file) {
            console.error('Usage: qctl run <program.json> [--audit <file.jsonl>] [--seed <n>] [--json]');
            return 1;
        }

        const config = loadControlPlaneConfig(process.env);
        const program = loadProgram(file);

        const seedFlag = args.flags.get('seed');
        const seed = typeof seedFlag === 'string' ? Number.parseInt(seedFlag, 10) : undefined;
        if (seed !== undefined && !Number.isFinite(seed)) {
            console.error(`Invalid --seed: ${String(seedFlag)}`);
            return 1;
        }

        const auditFlag = args.flags.get('audit');
        const sink: AuditSink = new JsonlAuditSink({
            filePath: typeof auditFlag === 'string' ? auditFlag : config.auditPath,
            fsyncMode: config.auditFsync,
        });

        const plane = new ControlPlane({
            backend: new SimulatedBackend({ seed }),
            config: {
                ...config,
                channelCount: program.channels ?? config.channelCount,
                // A program that sizes the processor replaces QCTL_MODULES
                moduleSizes: program.modules ?? (program.channels === undefined ? config.moduleSizes : undefined),
            },
            auditSink: sink,
        });

        try {
            const run = await runProgram(plane, program);
            if (args.flags.has('json')) {
                const printable = {
                    ...run,
                    dispatch: run.dispatch.map(d => (d.ok ? d : { ok: false, error: d.error.message })),
                    status: plane.status(),
                };
                console.log(JSON.stringify(printable, null, 2));
            } else {
                for (const line of formatRun(run)) console.log(line);
                const s = plane.status();
                console.log(`Audit: ${s.auditEntries} entries, ${s.auditWriteFailures} write failure(s); skipped=${s.skippedTotal}`);
            }
            const failed = run.dispatch.some(d => !d.ok) || plane.audit.writeFailures > 0;
            return failed ? 2 : 0;
        } finally {
            plane.close();
        }
    }

    private runAudit(args: ParsedArgs): number {
        const file = args.positional[0];
        if (!file) {
            console.error('Usage: qctl audit <file.jsonl>');
            return 1;
        }
        if (!fs.existsSync(file)) {
            console.error(`Audit file not found: ${file}`);
            return 1;
        }
        const entries = readJsonlAudit(file);
        for (const e of entries) console.log(formatAuditEntry(e));
        console.log(`${entries.length} entries`);
        return 0;
    }

    private showHelp(): void {
        console.log(`
qctl — multi-channel processor control plane

Commands:
  run <program.json>    Calibrate, dispatch and measure as described by a program file
      --audit <file>    JSONL audit destination (default: $QCTL_AUDIT_FILE or logs/audit.jsonl)
      --seed <n>        Seed for the simulated backend's readout
      --json            Print the full run as JSON
  audit <file>          Print a JSONL audit log
  help                  Show this message
`);
    }
}

if (require.main === module) {
    new ControlPlaneCLI().run(process.argv).then(
        (code) => process.exit(code),
        (err: unknown) => {
            console.error(`Error: ${describeError(err)}`);
            process.exit(1);
        }
    );
}
