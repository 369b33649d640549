import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as zlib from 'zlib';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ParsingError } from '../constants.js';
import { FileCompression } from '../fileCompression.js';
import KillTally from '../killTally.js';
import { Parser } from '../parser.js';

const SAMPLE_LOG = [
  '  0:00 ------------------------------------------------------------',
  '  0:00 InitGame: \\sv_hostname\\Test Server',
  ' 0:01 ClientConnect: 1',
  ' 0:02 ClientUserinfoChanged: 1 n\\TestPlayer\\t\\0',
  ' 0:03 Item: 1 weapon_shotgun',
  ' 0:04 Kill: 1 1 2: TestPlayer killed Bot by MOD_SHOTGUN',
  ' 0:05 ShutdownGame:',
  ' 0:05 ------------------------------------------------------------',
  '',
].join('\r\n');

describe('Parser', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fraglog-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('parses a plain log file', async () => {
    const logPath = path.join(workDir, 'games.log');
    fs.writeFileSync(logPath, SAMPLE_LOG);

    const parsed = await new Parser(logPath).parse();

    expect(parsed.games).toHaveLength(1);
    const game = parsed.games[0];
    expect(game.completed).toBe(true);
    expect(game.events).toHaveLength(6);
    expect(Array.from(game.players)).toEqual([[1, 'TestPlayer']]);
    expect(game.kills).toHaveLength(1);
    expect(parsed.killers.get('TestPlayer')).toBe(1);
    expect(parsed.killsByMeans.get('MOD_SHOTGUN')).toBe(1);
  });

  it('parses a brotli-compressed log file', async () => {
    const logPath = path.join(workDir, 'games.log.br');
    fs.writeFileSync(logPath, zlib.brotliCompressSync(Buffer.from(SAMPLE_LOG, 'utf8')));

    const parsed = await new Parser(logPath).parse();

    expect(parsed.games).toHaveLength(1);
    expect(parsed.games[0].events).toHaveLength(6);
  });

  it('rejects with a FILE_FAILURE when the log cannot be read', async () => {
    const missing = path.join(workDir, 'missing.log');

    await expect(new Parser(missing).parse()).rejects.toBeInstanceOf(ParsingError);
    await expect(new Parser(missing).parse()).rejects.toMatchObject({ name: 'FILE_FAILURE' });
  });

  it('parses in-memory text the same way', () => {
    const parsed = Parser.parseText(SAMPLE_LOG);
    expect(parsed.games).toHaveLength(1);
    expect(parsed.games[0].initDetails).toBe('\\sv_hostname\\Test Server');
  });

  it('exposes overall tallies that callers cannot add to', () => {
    const parsed = Parser.parseText([
      '0:00 InitGame: x',
      '0:01 Kill: 1 1022 2: <world> killed Bob by MOD_FALLING',
      '0:02 Kill: 2 3 2: Alice killed Bob by MOD_SHOTGUN',
      '0:03 ShutdownGame:',
    ].join('\n'));

    for (const tally of [parsed.killers, parsed.killsByMeans, parsed.games[0].killers]) {
      expect(tally).not.toBeInstanceOf(KillTally);
      expect('increment' in tally).toBe(false);
    }
    expect(parsed.killers.toJSON()).toEqual({ Alice: 1 });
    expect(parsed.killsByMeans.toJSON()).toEqual({ MOD_FALLING: 1, MOD_SHOTGUN: 1 });
  });

  it('returns an empty result for a log with no games', () => {
    const parsed = Parser.parseText('nothing to see here\n');
    expect(parsed.games).toHaveLength(0);
    expect(parsed.killsByMeans.size).toBe(0);
    expect(parsed.killers.size).toBe(0);
  });
});

describe('FileCompression', () => {
  it('treats only .br files as compressed', () => {
    expect(FileCompression.isCompressed('logs/games.log.br')).toBe(true);
    expect(FileCompression.isCompressed('logs/games.log')).toBe(false);
  });
});
