import { describe, it, expect } from 'vitest';
import { replCommand, PROMPT } from '../../src/commands/repl.js';
import { CliError } from '../../src/lib/errors.js';
import { renderHelp } from '../../src/ui/render.js';
import { captureLogger, ScriptedLines, STAGE, STATUS, stubCore, testContext } from '../helpers/harness.js';

const AUDIT_AFTER_TWO = [
  'Audit Summary:',
  '  Total queries: 2',
  '  Verified: 1',
  '  Unverified: 0',
  '  Partial: 1',
  '  Verification rate: 50.0%',
].join('\n');

function coreWithGraph() {
  return stubCore({
    'GET /status': () => ({ body: STATUS }),
    'GET /stage': () => ({ body: STAGE }),
    'POST /query': (body) => {
      const isLookup = typeof body === 'object' && body !== null && 'type' in body && body.type === 'lookup';
      return {
        body: isLookup
          ? { success: true, found: true, path: [1, 2], edges: [], error: null }
          : { success: true, found: false, path: [], edges: [], error: null },
      };
    },
  });
}

describe('repl command', () => {
  it('prints a banner read through the dispatcher', async () => {
    const core = coreWithGraph();
    const logger = captureLogger();

    await replCommand({}, testContext(core.fetch, logger), () => new ScriptedLines([]));

    expect(logger.lines.slice(0, 5)).toEqual([
      ['debug', 'Connected to http://localhost:8080 (concurrent client)'],
      ['success', 'Connected to http://localhost:8080 (concurrent client)'],
      ['info', 'Graph: 3 nodes, 2 edges, 1 stable'],
      ['info', 'Stage S1: Pattern Crystallization (40% to next)'],
      ['newline', ''],
    ]);
    expect(logger.lines[5]).toEqual(['log', renderHelp()]);
  });

  it('answers commands, handles meta commands and stops at quit', async () => {
    const core = coreWithGraph();
    const logger = captureLogger();
    const source = new ScriptedLines(['', 'help', 'lookup 1', 'path 1 5', 'AUDIT', 'quit', 'lookup 2']);

    await replCommand({}, testContext(core.fetch, logger), () => source);

    expect(source.prompts).toEqual(Array.from({ length: 6 }, () => PROMPT));
    expect(source.closed).toBe(true);
    expect(core.calls).toEqual(['GET /health', 'GET /status', 'GET /stage', 'POST /query', 'POST /query']);

    const logged = logger.lines.filter(([level]) => level === 'log').map(([, message]) => message);
    expect(logged[1]).toBe(renderHelp());
    expect(logged[2]?.split('\n')).toContain('| - [FACT] Entity 1 exists in the graph [path: 1 -> 2]');
    expect(logged[3]?.split('\n')).toContain('| - [INFERENCE] A path exists from 1 to 5 [0% confidence]');
    expect(logged.slice(4)).toEqual([AUDIT_AFTER_TWO, AUDIT_AFTER_TWO]);
  });

  it('ends at end of input without printing an empty summary', async () => {
    const core = coreWithGraph();
    const logger = captureLogger();

    await replCommand({}, testContext(core.fetch, logger), () => new ScriptedLines(['audit']));

    const logged = logger.lines.filter(([level]) => level === 'log').map(([, message]) => message);
    expect(logged).toEqual([
      renderHelp(),
      ['Audit Summary:', '  Total queries: 0', '  Verified: 0', '  Unverified: 0', '  Partial: 0'].join('\n'),
    ]);
  });

  it('reports Unknown entries for failed reads in the banner', async () => {
    const core = stubCore({});
    const logger = captureLogger();

    await replCommand({}, testContext(core.fetch, logger), () => new ScriptedLines(['q']));

    expect(logger.lines.slice(2, 4)).toEqual([
      ['info', 'status: Could not retrieve status'],
      ['info', 'stage: Could not retrieve stage'],
    ]);
  });

  it('refuses to start when the Core is unreachable and never opens input', async () => {
    const core = stubCore({ 'GET /health': () => ({ status: 503, body: {} }) });
    let opened = false;

    const run = replCommand({}, testContext(core.fetch), () => {
      opened = true;
      return new ScriptedLines([]);
    });

    await expect(run).rejects.toBeInstanceOf(CliError);
    await expect(run).rejects.toMatchObject({
      code: 'CORE_UNREACHABLE',
      message: 'Could not connect to the Core at http://localhost:8080',
    });
    expect(opened).toBe(false);
  });
});
