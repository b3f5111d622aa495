/**
 * followFile over a scripted sequence of file contents. Each read returns the
 * next snapshot (the last one repeats); the loop is stopped through its signal.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, appendFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { followFile } from '../src/cli/follow.js';
import { runScan } from '../src/cli/run.js';
import { Reporter } from '../src/cli/reporter.js';
import { readCommandLine } from '../src/cli/options.js';
import type { ScanEvent, ScanPass } from '../src/ntlm/types.js';
import { concat } from '../src/bytes/primitives.js';
import { authenticateMessage, challengeMessage, filled } from './helpers/messages.js';

const CHALLENGE_A = new Uint8Array([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08]);
const CHALLENGE_B = new Uint8Array([0x21, 0x22, 0x23, 0x24, 0x25, 0x26, 0x27, 0x28]);
const NT_RESPONSE = concat(filled(16, 0xaa), filled(4, 0xbb));
const TAIL = `${'aa'.repeat(16)}:bbbbbbbb`;

const type3 = (username: string) =>
  authenticateMessage({ username, workstation: 'WS1', ntResponse: NT_RESPONSE });

interface Run {
  passes: ScanPass[];
  events: ScanEvent[];
  reads: number;
}

/** Follow `snapshots`, aborting once `stopAfter` passes have scanned new bytes. */
async function follow(snapshots: Uint8Array[], stopAfter: number, carryChallenge?: boolean) {
  const controller = new AbortController();
  const run: Run = { passes: [], events: [], reads: 0 };
  const summary = await followFile('capture.etl', {
    intervalMs: 1,
    signal: controller.signal,
    carryChallenge,
    read: () => snapshots[Math.min(run.reads++, snapshots.length - 1)],
    onEvent: (e) => run.events.push(e),
    onPass: (p) => {
      run.passes.push(p);
      if (run.passes.length >= stopAfter) controller.abort();
    },
  });
  return { summary, ...run };
}

function hashes(events: ScanEvent[]): string[] {
  return events.flatMap((e) => (e.kind === 'hash' ? [e.hash] : []));
}

describe('followFile', () => {
  it('scans only the bytes appended since the previous pass', async () => {
    const first = concat(challengeMessage(CHALLENGE_A), type3('alice'));
    const second = concat(first, challengeMessage(CHALLENGE_B), type3('bob'));
    const { summary, passes, events } = await follow([first, first, second], 2);

    expect(hashes(events)).toEqual([
      `alice::WS1:0102030405060708:${TAIL}`,
      `bob::WS1:2122232425262728:${TAIL}`,
    ]);
    expect(passes.map((p) => [p.start, p.end])).toEqual([
      [0, first.length],
      [first.length - 7, second.length],
    ]);
    expect(summary).toEqual({ passes: 2, hashes: 2, lastEnd: second.length });
  });

  it('pairs a challenge and a response that arrive in different passes', async () => {
    const first = challengeMessage(CHALLENGE_A);
    const second = concat(first, type3('carol'));
    const { events } = await follow([first, second], 2);
    expect(hashes(events)).toEqual([`carol::WS1:0102030405060708:${TAIL}`]);
  });

  it('can drop the challenge between passes instead', async () => {
    const first = challengeMessage(CHALLENGE_A);
    const second = concat(first, type3('carol'));
    const { events } = await follow([first, second], 2, false);
    expect(events.map((e) => e.kind)).toEqual(['challenge', 'no-challenge']);
  });

  it('finds a signature that straddles the end of the previous pass exactly once', async () => {
    const full = concat(challengeMessage(CHALLENGE_A), type3('dave'));
    const partial = full.slice(0, 48 + 5);
    const { events, passes } = await follow([partial, full], 2);

    expect(events.map((e) => `${e.kind}@${e.occurrence.offset}`)).toEqual(['challenge@0', 'hash@48']);
    expect(passes[1].start).toBe(46);
  });

  it('decodes a message whose payload lands in the next chunk', async () => {
    const full = concat(challengeMessage(CHALLENGE_A), type3('grace'));
    const partial = full.slice(0, 48 + 30);
    const { events, passes } = await follow([partial, full], 2);

    expect(events.map((e) => `${e.kind}@${e.occurrence.offset}`)).toEqual(['challenge@0', 'hash@48']);
    expect(hashes(events)).toEqual([`grace::WS1:0102030405060708:${TAIL}`]);
    expect(passes[0].held?.offset).toBe(48);
    expect(passes[1].start).toBe(48);
  });

  it('holds a signature whose type field is cut off', async () => {
    const full = concat(challengeMessage(CHALLENGE_A), type3('heidi'));
    const { events, passes } = await follow([full.slice(0, 48 + 10), full], 2);

    expect(events.map((e) => `${e.kind}@${e.occurrence.offset}`)).toEqual(['challenge@0', 'hash@48']);
    expect(passes[1].start).toBe(48);
  });

  it('keeps the challenge for a held message even without carry-over', async () => {
    const full = concat(challengeMessage(CHALLENGE_A), type3('ivan'));
    const { events } = await follow([full.slice(0, 48 + 30), full], 2, false);
    expect(hashes(events)).toEqual([`ivan::WS1:0102030405060708:${TAIL}`]);
  });

  it('starts over when the file shrinks', async () => {
    const long = concat(challengeMessage(CHALLENGE_A), type3('a-much-longer-name'));
    const short = concat(challengeMessage(CHALLENGE_B), type3('eve'));
    const { events, passes } = await follow([long, short], 2);

    expect(hashes(events)).toEqual([
      `a-much-longer-name::WS1:0102030405060708:${TAIL}`,
      `eve::WS1:2122232425262728:${TAIL}`,
    ]);
    expect(passes[1].start).toBe(0);
  });

  it('stops before the first pass when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let reads = 0;
    const summary = await followFile('capture.etl', {
      intervalMs: 1,
      signal: controller.signal,
      read: () => {
        reads++;
        return new Uint8Array(0);
      },
    });
    expect(summary).toEqual({ passes: 0, hashes: 0, lastEnd: 0 });
    expect(reads).toBe(0);
  });
});

describe('runScan in follow mode', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('picks up hashes appended to the file until interrupted', async () => {
    dir = mkdtempSync(join(tmpdir(), 'ntlm-follow-'));
    const input = join(dir, 'PktMon.etl');
    writeFileSync(input, challengeMessage(CHALLENGE_A));

    const controller = new AbortController();
    const lines: string[] = [];
    const reporter = new Reporter({
      quiet: true,
      out: (line) => {
        lines.push(line);
        controller.abort();
      },
    });

    const command = readCommandLine(['-i', input, '-f', '-q', '-n', '5']);
    if (command.kind !== 'scan') throw new Error('expected a scan command');

    const running = runScan(command.config, { reporter, signal: controller.signal });
    setTimeout(() => appendFileSync(input, type3('frank')), 20);

    const result = await running;
    expect(lines).toEqual([`frank::WS1:0102030405060708:${TAIL}`]);
    expect(result.hashes).toBe(1);
  });
});
