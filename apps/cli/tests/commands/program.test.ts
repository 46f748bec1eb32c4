import { describe, it, expect, vi } from 'vitest';
import type { SessionOptions } from '@groundcheck/core';
import { createProgram } from '../../src/program.js';
import { captureLogger, opener, ScriptedLines, STAGE, STATUS, stubCore, testConfig, type Handler } from '../helpers/harness.js';

function setup(routes: Record<string, Handler>) {
  const core = stubCore(routes);
  const logger = captureLogger();
  const exit = vi.fn();
  const seen: SessionOptions[] = [];

  const program = createProgram({
    loadConfig: () => testConfig({ GROUNDCHECK_API_KEY: 'test-secret' }),
    openSession: opener(core.fetch, seen),
    exit,
    logger: () => logger,
    lineSource: () => new ScriptedLines([]),
  });
  program.exitOverride();
  program.configureOutput({ writeOut: () => {}, writeErr: () => {} });

  const run = (args: string[]) => program.parseAsync(args, { from: 'user' });
  const logged = () => logger.lines.filter(([level]) => level === 'log').map(([, message]) => message);

  return { core, logger, exit, seen, run, logged };
}

const FOUND = { success: true, found: true, path: [1, 2], edges: [], error: null };

describe('groundcheck program', () => {
  describe('query', () => {
    it('prints the honest response for one command', async () => {
      const { run, logged, exit, core } = setup({ 'POST /query': () => ({ body: FOUND }) });

      await run(['query', 'lookup', '1']);

      expect(exit).not.toHaveBeenCalled();
      expect(core.calls).toEqual(['GET /health', 'POST /query']);
      expect(logged()[0]?.split('\n')).toContain('| - [FACT] Entity 1 exists in the graph [path: 1 -> 2]');
    });

    it('prints JSON with --json', async () => {
      const { run, logged } = setup({ 'POST /query': () => ({ body: FOUND }) });

      await run(['--json', 'query', 'lookup', '1']);

      expect(JSON.parse(logged()[0] ?? '')).toEqual({
        facts: [{ statement: 'Entity 1 exists in the graph', evidencePath: [1, 2] }],
        inferences: [],
        unknowns: [],
      });
    });

    it('rejoins the words so quoted values reach the grammar intact', async () => {
      const seenBodies: unknown[] = [];
      const { run, logged } = setup({
        'POST /signal': (body) => {
          seenBodies.push(body);
          return { body: { success: true, node_id: 7, error: null } };
        },
      });

      await run(['query', 'ingest', '1', 'name', 'Alice Smith']);

      expect(seenBodies).toEqual([{ entity_id: 1, attribute: 'name', value: 'Alice Smith' }]);
      expect(logged()[0]?.split('\n')).toContain(
        '| - [FACT] Signal ingested: entity=1, attr=name, value=Alice Smith [path: 7]'
      );
    });

    it('applies flags over configuration', async () => {
      const { run, seen } = setup({ 'POST /query': () => ({ body: FOUND }) });

      await run(['--server', 'http://core.test:9000', '--timeout', '500', '--mode', 'serial', 'query', 'lookup', '1']);

      expect(seen).toEqual([
        {
          baseUrl: 'http://core.test:9000',
          timeoutMs: 500,
          maxRetries: 2,
          retryDelayMs: 100,
          apiKey: 'test-secret',
          mode: 'serial',
        },
      ]);
    });

    it('exits with 1 when the Core is unreachable', async () => {
      const { run, exit, logger, core } = setup({ 'GET /health': () => ({ status: 503, body: {} }) });

      await run(['query', 'lookup', '1']);

      expect(exit).toHaveBeenCalledWith(1);
      expect(logger.lines).toContainEqual(['logError', 'Could not connect to the Core at http://localhost:8080']);
      expect(core.calls).toEqual(['GET /health']);
    });
  });

  describe('status', () => {
    it('prints graph counts and stage', async () => {
      const { run, logged } = setup({
        'GET /status': () => ({ body: STATUS }),
        'GET /stage': () => ({ body: STAGE }),
      });

      await run(['status']);

      expect(logged()).toEqual([
        [
          'Connected to: http://localhost:8080',
          '',
          'Graph Status:',
          '  Nodes: 3',
          '  Edges: 2',
          '  Stable Edges: 1',
          '',
          'Developmental Stage:',
          '  Stage: S1',
          '  Name: Pattern Crystallization',
          '  Progress: 40%',
        ].join('\n'),
      ]);
    });

    it('leaves out a section the Core could not provide', async () => {
      const { run, logged, logger } = setup({ 'GET /status': () => ({ body: STATUS }) });

      await run(['status']);

      expect(logged()).toEqual([
        ['Connected to: http://localhost:8080', '', 'Graph Status:', '  Nodes: 3', '  Edges: 2', '  Stable Edges: 1'].join('\n'),
      ]);
      expect(logger.lines).toContainEqual(['debug', 'Stage unavailable: HTTP 404']);
    });
  });

  describe('config', () => {
    it('prints the configuration with the API key redacted', async () => {
      const { run, core } = setup({});
      const printed: string[] = [];
      const spy = vi.spyOn(console, 'log').mockImplementation((value: unknown) => {
        printed.push(String(value));
      });

      await run(['config']);
      spy.mockRestore();

      expect(printed).toHaveLength(1);
      expect(JSON.parse(printed[0] ?? '')).toMatchObject({
        GROUNDCHECK_API_KEY: 'test***REDACTED***cret',
        GROUNDCHECK_MAX_RETRIES: 2,
      });
      expect(core.calls).toEqual([]);
    });
  });

  it('runs the REPL when no command is given', async () => {
    const { run, logger } = setup({});

    await run([]);

    expect(logger.lines).toContainEqual(['success', 'Connected to http://localhost:8080 (concurrent client)']);
  });

  it('rejects an unknown client mode', async () => {
    const { run } = setup({});

    await expect(run(['--mode', 'parallel', 'status'])).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });

  it('rejects a non-numeric timeout', async () => {
    const { run } = setup({});

    await expect(run(['--timeout', 'soon', 'status'])).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });
});
