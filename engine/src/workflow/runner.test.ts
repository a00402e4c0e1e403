import { mkdtemp, readFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it } from 'vitest';

import type { ModelResult } from '../model/client.js';
import { InMemoryPromptLibrary } from '../prompts/library.js';
import { workflow } from '../test/fixtures.js';
import { StubModelClient, fail, flush, ok, scripted, type RecordedCall } from '../test/stub-model.js';
import { RunStore, deserializeRunState, serializeRunState } from './run-store.js';
import { WorkflowRunner, type RunnerOptions } from './runner.js';
import type { EngineEvent, WorkflowDefinition } from './types.js';

function runner(wf: WorkflowDefinition, model: StubModelClient, extra: Partial<RunnerOptions> = {}) {
  const instance = new WorkflowRunner(wf, {
    model,
    prompts: new InMemoryPromptLibrary(),
    retry: { baseDelayMs: 1, maxDelayMs: 1 },
    ...extra,
  });
  const events: EngineEvent[] = [];
  instance.onEvent(event => events.push(event));
  return { runner: instance, events };
}

function untilAborted(_call: RecordedCall, signal?: AbortSignal): Promise<ModelResult> {
  return new Promise(resolve => {
    signal?.addEventListener('abort', () => resolve(ok('late')), { once: true });
  });
}

const tavern = workflow([
  {
    id: 'tavern',
    steps: [
      { id: 'describe', prompt: 'Describe the tavern.' },
      { id: 'bartender', prompt: 'Introduce the bartender.' },
    ],
  },
]);

const twoRooms = workflow([
  { id: 'yard', steps: [{ id: 'yard-look', prompt: 'Describe the yard.' }] },
  { id: 'cellar', steps: [{ id: 'cellar-look', prompt: 'Describe the cellar.' }] },
]);

describe('WorkflowRunner', () => {
  it('should run the tavern scenario to completion', async () => {
    const model = scripted(['Smoke hangs over the tables.', 'A one-eyed man polishes a mug.']);
    const { runner: run, events } = runner(tavern, model);

    run.start();

    expect(await run.whenSettled()).toBe('completed');
    const state = run.getState();
    expect(state?.context.map(entry => [entry.role, entry.text])).toEqual([
      ['ai', 'Smoke hangs over the tables.'],
      ['ai', 'A one-eyed man polishes a mug.'],
    ]);
    expect(events.map(event => event.type)).toEqual([
      'session_started',
      'node_entered',
      'step_started',
      'step_completed',
      'step_started',
      'step_completed',
      'completed',
    ]);
    expect(model.calls[1].systemPrompt).toBe('Introduce the bartender.');
  });

  it('should retry RateLimited twice and append once', async () => {
    const results = [fail('RateLimited'), fail('RateLimited'), ok('The door swings open.')];
    const model = new StubModelClient(() => results.shift() ?? ok('unused'));
    const wf = workflow([{ id: 'door', steps: [{ id: 'open', prompt: 'Open the door.' }] }]);
    const { runner: run, events } = runner(wf, model);

    run.start();

    expect(await run.whenSettled()).toBe('completed');
    expect(model.calls).toHaveLength(3);
    expect(run.getState()?.context.map(entry => entry.text)).toEqual(['The door swings open.']);
    expect(events.some(event => event.type === 'failed')).toBe(false);
  });

  it('should render world attributes into the step prompt', async () => {
    const model = scripted(['Hello, Mara.']);
    const wf = workflow([{ id: 'greet', steps: [{ id: 'hello', prompt: 'Greet {{hero}}.', useContext: false }] }]);
    const { runner: run } = runner(wf, model);

    run.start({ hero: 'Mara' });
    await run.whenSettled();

    expect(model.calls[0].systemPrompt).toBe('Greet Mara.');
  });

  it('should begin at the entry node', async () => {
    const model = scripted(['Dark and damp.']);
    const { runner: run, events } = runner(workflow(twoRooms.nodes, { entryNodeId: 'cellar' }), model);

    run.start();
    await run.whenSettled();

    expect(events.filter(event => event.type === 'node_entered')).toMatchObject([{ nodeId: 'cellar', progress: 50 }]);
    expect(model.calls).toHaveLength(1);
  });

  it('should feed submitted player input to the step', async () => {
    const model = scripted(['The bartender pours an ale.']);
    const wf = workflow([
      { id: 'bar', steps: [{ id: 'order', prompt: 'Serve the player.', awaitPlayerInput: true, inputPrompt: 'Order?' }] },
    ]);
    const { runner: run, events } = runner(wf, model);
    run.onEvent(event => {
      if (event.type === 'input_requested') run.submitInput('One ale, please.');
    });

    run.start();

    expect(await run.whenSettled()).toBe('completed');
    expect(events.find(event => event.type === 'input_requested')).toMatchObject({ stepId: 'order', prompt: 'Order?' });
    expect(run.getState()?.context.map(entry => [entry.role, entry.text])).toEqual([
      ['player', 'One ale, please.'],
      ['ai', 'The bartender pours an ale.'],
    ]);
  });

  it('should fail with a readable reason on a non-transient model error', async () => {
    const model = new StubModelClient(() => fail('Unauthorized'));
    const { runner: run, events } = runner(tavern, model);

    run.start();

    expect(await run.whenSettled()).toBe('failed');
    expect(model.calls).toHaveLength(1);
    const failed = events[events.length - 1];
    expect(failed.type).toBe('failed');
    expect(failed.type === 'failed' ? failed.reason : '').toBe('Model call failed [Unauthorized]: stub Unauthorized');
    expect(run.getState()?.failureReason).toBe('Model call failed [Unauthorized]: stub Unauthorized');
  });

  it('should suspend at the last commit when cancelled', async () => {
    const model = new StubModelClient((call, signal) =>
      call.systemPrompt === 'Describe the tavern.' ? ok('Warm.') : untilAborted(call, signal),
    );
    const { runner: run, events } = runner(tavern, model);

    run.start();
    await flush();
    expect(model.calls).toHaveLength(2);
    run.cancel();

    expect(await run.whenSettled()).toBe('suspended');
    const state = run.getState();
    expect(state?.context.map(entry => entry.text)).toEqual(['Warm.']);
    expect(state?.cursor).toEqual({ nodeIndex: 0, stepIndex: 1, completedStepIds: [] });
    expect(events[events.length - 1].type).toBe('suspended');
  });

  it('should treat a suspend request during an input wait as a cancellation', async () => {
    const wf = workflow([{ id: 'bar', steps: [{ id: 'order', prompt: 'Serve.', awaitPlayerInput: true }] }]);
    const first = runner(wf, scripted([]));
    first.runner.onEvent(event => {
      if (event.type === 'input_requested') first.runner.requestSuspend();
    });

    first.runner.start();
    expect(await first.runner.whenSettled()).toBe('suspended');
    const saved = first.runner.getState();
    expect(saved?.context).toEqual([]);

    const model = scripted(['Ale for you.']);
    const second = runner(wf, model);
    second.runner.onEvent(event => {
      if (event.type === 'input_requested') second.runner.submitInput('Ale.');
    });
    if (saved) second.runner.resume(saved);

    expect(await second.runner.whenSettled()).toBe('completed');
    expect(second.runner.getState()?.context.map(entry => entry.text)).toEqual(['Ale.', 'Ale for you.']);
  });

  it('should fail a parallel group whose sibling is waiting for input', async () => {
    const model = new StubModelClient(call => (call.systemPrompt === 'Shout.' ? fail('Unauthorized') : ok('unused')));
    const wf = workflow([
      {
        id: 'crowd',
        steps: [
          { id: 'ask', prompt: 'Ask.', executionMode: 'parallel', awaitPlayerInput: true },
          { id: 'shout', prompt: 'Shout.', executionMode: 'parallel' },
        ],
      },
    ]);
    const { runner: run, events } = runner(wf, model);

    run.start();

    expect(await run.whenSettled()).toBe('failed');
    expect(events.filter(event => event.type === 'input_requested')).toHaveLength(1);
    expect(events[events.length - 1]).toMatchObject({ type: 'failed' });
    run.submitInput('Too late.');
    expect(run.getState()?.pendingInput).toEqual(['Too late.']);
  });

  it('should refuse to resume a session of another workflow', async () => {
    const source = runner(tavern, scripted(['One.', 'Two.']));
    source.runner.start();
    source.runner.requestSuspend();
    await source.runner.whenSettled();
    const saved = source.runner.getState();

    const model = scripted([]);
    const other = runner(twoRooms, model);
    if (saved) other.runner.resume({ ...saved, workflowId: 'elsewhere' });

    expect(other.runner.getStatus()).toBe('failed');
    expect(other.events).toHaveLength(1);
    expect(other.events[0]).toMatchObject({ type: 'failed' });
    expect(other.events[0].type === 'failed' ? other.events[0].reason : '').toContain('[workflow_mismatch]');
    expect(model.calls).toHaveLength(0);
  });

  it('should refuse to resume a completed session', async () => {
    const done = runner(tavern, scripted(['One.', 'Two.']));
    done.runner.start();
    await done.runner.whenSettled();
    const state = done.runner.getState();

    const again = runner(tavern, scripted([]));
    if (state) again.runner.resume(state);

    expect(again.runner.getStatus()).toBe('failed');
    expect(again.events[0].type === 'failed' ? again.events[0].reason : '').toContain('[not_resumable]');
  });
});

describe('WorkflowRunner suspend and resume', () => {
  const story = workflow([
    {
      id: 'arrive',
      steps: [
        { id: 'look', prompt: 'Look.' },
        { id: 'greet', prompt: 'Greet.' },
      ],
    },
    {
      id: 'bar',
      loopPolicy: 'conditional',
      loopPrompt: 'Has the bard finished?',
      maxIterations: 3,
      steps: [
        { id: 'song', prompt: 'Song.', executionMode: 'parallel' },
        { id: 'crowd', prompt: 'Crowd.', executionMode: 'parallel' },
        { id: 'chat', prompt: 'Chat.', loopPolicy: 'conditional', loopPrompt: 'Did the bartender answer?', maxIterations: 2 },
      ],
    },
  ]);

  // Replies depend only on the request, so a resumed run sees the same ones.
  function storyModel(): StubModelClient {
    return new StubModelClient(call => {
      if (!call.judgment) {
        return ok(`${call.systemPrompt} reply`);
      }
      if (call.systemPrompt.endsWith('Condition: Has the bard finished?')) {
        const text = call.conversation.map(message => message.content).join('\n');
        return ok(text.split('Song. reply').length - 1 >= 2 ? 'YES' : 'NO');
      }
      return ok('NO');
    });
  }

  const comparable = (events: EngineEvent[]) =>
    events
      .filter(event => event.type !== 'session_started' && event.type !== 'suspended')
      .map(event => ({ ...event, timestamp: '' }));

  async function uninterrupted(): Promise<EngineEvent[]> {
    const { runner: run, events } = runner(story, storyModel());
    run.start();
    await run.whenSettled();
    return events;
  }

  it('should run the reference story through both bar passes', async () => {
    const events = await uninterrupted();

    expect(events.filter(event => event.type === 'step_completed')).toHaveLength(10);
    expect(events.filter(event => event.type === 'loop_bound_exceeded')).toHaveLength(2);
    expect(events[events.length - 1].type).toBe('completed');
  });

  it.each([1, 2, 3, 4, 5, 6, 9, 10])(
    'should replay the same events after suspending at reply %i',
    async suspendAt => {
      const reference = await uninterrupted();

      const first = runner(story, storyModel());
      let replies = 0;
      first.runner.onEvent(event => {
        if (event.type === 'step_completed' && ++replies === suspendAt) first.runner.requestSuspend();
      });
      first.runner.start();
      expect(await first.runner.whenSettled()).toBe('suspended');

      const snapshot = first.runner.getState();
      if (!snapshot) throw new Error('runner kept no state');
      const restored = deserializeRunState(serializeRunState(snapshot));

      const second = runner(story, storyModel());
      second.runner.resume(restored);
      expect(await second.runner.whenSettled()).toBe('completed');

      expect([...comparable(first.events), ...comparable(second.events)]).toEqual(comparable(reference));
    },
  );

  it('should write byte-identical snapshots when saved twice', async () => {
    const runStore = new RunStore(await mkdtemp(join(tmpdir(), 'story-saves-')));
    const { runner: run } = runner(story, storyModel(), { runStore });
    run.onEvent(event => {
      if (event.type === 'step_completed' && event.stepId === 'greet') run.requestSuspend();
    });

    run.start();
    await run.whenSettled();

    const firstPath = await run.save('manual');
    const firstBytes = await readFile(firstPath, 'utf8');
    await run.save('manual');

    expect(await readFile(firstPath, 'utf8')).toBe(firstBytes);
    expect(deserializeRunState(firstBytes).status).toBe('suspended');
  });

  it('should autosave after each node and resume from the slot', async () => {
    const runStore = new RunStore(await mkdtemp(join(tmpdir(), 'story-saves-')));
    const model = new StubModelClient(call =>
      call.systemPrompt === 'Describe the cellar.' ? fail('Unauthorized') : ok('Muddy.'),
    );
    const { runner: run } = runner(twoRooms, model, { runStore });

    run.start();
    expect(await run.whenSettled()).toBe('failed');

    const autosave = await runStore.load(twoRooms.id, 'autosave');
    expect(autosave?.status).toBe('suspended');
    expect(autosave?.cursor).toEqual({ nodeIndex: 1, stepIndex: 0, completedStepIds: [] });

    const retry = runner(twoRooms, scripted(['Cold.']), { runStore });
    expect(await retry.runner.resumeSlot('autosave')).toBe(true);
    expect(await retry.runner.whenSettled()).toBe('completed');
    expect(retry.runner.getState()?.context.map(entry => entry.text)).toEqual(['Muddy.', 'Cold.']);
  });

  it('should report a missing slot without starting', async () => {
    const runStore = new RunStore(await mkdtemp(join(tmpdir(), 'story-saves-')));
    const { runner: run, events } = runner(tavern, scripted([]), { runStore });

    expect(await run.resumeSlot('nothing-here')).toBe(false);
    expect(run.getStatus()).toBe('idle');
    expect(events).toEqual([]);
  });

  it('should archive the previous autosave when a new session starts', async () => {
    const runStore = new RunStore(await mkdtemp(join(tmpdir(), 'story-saves-')));
    const first = runner(twoRooms, scripted(['Muddy.']), { runStore });
    first.runner.onEvent(event => {
      if (event.type === 'step_completed') first.runner.requestSuspend();
    });
    first.runner.start();
    expect(await first.runner.whenSettled()).toBe('suspended');
    const oldSession = first.runner.getState()?.sessionId;
    expect((await runStore.load(twoRooms.id, 'autosave'))?.sessionId).toBe(oldSession);

    const second = runner(twoRooms, new StubModelClient(() => fail('Unauthorized')), { runStore });
    second.runner.start();
    expect(await second.runner.whenSettled()).toBe('failed');

    expect(await runStore.load(twoRooms.id, 'autosave')).toBeNull();
  });

  it('should archive the autosave when the session ends', async () => {
    const runStore = new RunStore(await mkdtemp(join(tmpdir(), 'story-saves-')));
    const { runner: run } = runner(twoRooms, scripted(['Muddy.', 'Cold.']), { runStore });

    run.start();
    await run.whenSettled();
    expect(await runStore.list(twoRooms.id)).toHaveLength(1);

    await run.end();

    expect(await runStore.list(twoRooms.id)).toEqual([]);
  });
});
