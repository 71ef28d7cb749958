import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { AssistantSession } from '../../../src/agent/session.js';
import type { ModelClient, ModelResponse } from '../../../src/agent/model.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import {
  ScriptedModelClient,
  createDeferred,
  createTestLogger,
  textResponse,
  toolCall,
  toolCallsResponse,
  type TestLogger,
} from '../../helpers/index.js';

describe('AssistantSession', () => {
  let registry: ToolRegistry;
  let log: TestLogger;

  beforeEach(() => {
    registry = new ToolRegistry();
    registry.register({
      name: 'explain_research_paper',
      description: 'Explain a paper',
      inputSchema: z.object({ paper_info: z.string() }),
      handler: async ({ paper_info }) => `Explanation of ${paper_info}`,
    });
    log = createTestLogger('assistant');
  });

  it('should carry the conversation across messages', async () => {
    const model = new ScriptedModelClient([textResponse('first'), textResponse('second')]);
    const session = new AssistantSession(model, registry, log.logger);

    await session.chat('one');
    const result = await session.chat('two');

    expect(result.text).toBe('second');
    expect(model.requests[1]?.turns.map((t) => t.role)).toEqual(['user', 'model', 'user']);
    expect(session.getHistory()).toHaveLength(4);
  });

  it('should clear history', async () => {
    const model = new ScriptedModelClient([textResponse('first'), textResponse('fresh')]);
    const session = new AssistantSession(model, registry, log.logger);

    await session.chat('one');
    session.clearHistory();
    await session.chat('two');

    expect(model.requests[1]?.turns).toHaveLength(1);
  });

  it('should pass loop options through', async () => {
    const model = new ScriptedModelClient([textResponse('ok')]);
    const session = new AssistantSession(model, registry, log.logger, { systemPrompt: 'Be brief.' });

    await session.chat('hi');

    expect(model.requests[0]?.system).toBe('Be brief.');
  });

  it('should log under its own name', async () => {
    const model = new ScriptedModelClient([textResponse('ok')]);
    const session = new AssistantSession(model, registry, log.logger, { name: 'cli' });

    await session.chat('hi');

    expect([...log.sink.query('info')][0]?.component).toBe('assistant.cli');
  });

  it('should refuse a second message while one is in flight', async () => {
    const gate = createDeferred<ModelResponse>();
    const model: ModelClient = { generate: () => gate.promise };
    const session = new AssistantSession(model, registry, log.logger);

    const first = session.chat('one');
    await expect(session.chat('two')).rejects.toThrow('already being processed');

    gate.resolve(textResponse('done'));
    expect((await first).text).toBe('done');
  });

  it('should run independent sessions concurrently over one sink', async () => {
    const gateA = createDeferred<ModelResponse>();
    const modelA = new ScriptedModelClient([
      () => toolCallsResponse([toolCall('explain_research_paper', { paper_info: 'A' })]),
      textResponse('answer A'),
    ]);
    const slowA: ModelClient = {
      generate: async (request) => {
        if (modelA.callCount === 1) {
          await gateA.promise;
        }
        return modelA.generate(request);
      },
    };
    const modelB = new ScriptedModelClient([textResponse('answer B')]);

    const sessionA = new AssistantSession(slowA, registry, log.logger, { name: 'a' });
    const sessionB = new AssistantSession(modelB, registry, log.logger, { name: 'b' });

    const pendingA = sessionA.chat('question A');
    const resultB = await sessionB.chat('question B');
    gateA.resolve(textResponse('unused'));
    const resultA = await pendingA;

    expect(resultB.text).toBe('answer B');
    expect(resultA.text).toBe('answer A');
    expect(resultA.modelCalls).toBe(2);
    expect(sessionB.getHistory()).toHaveLength(2);
    expect(sessionA.getHistory()).toHaveLength(4);

    const components = new Set([...log.sink.query()].map((r) => r.component));
    expect(components).toEqual(new Set(['assistant.a', 'assistant.b']));
  });
});
