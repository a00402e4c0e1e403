#!/usr/bin/env node
import { createInterface } from 'readline/promises';

import { USAGE, formatEvent, formatSummary, parseCliArgs } from './cli-support.js';
import { loadProviders } from './model/providers.js';
import { OpenAiCompatibleClient } from './model/openai-compatible.js';
import { loadPromptLibrary } from './prompts/library.js';
import { describeError } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { GracefulShutdown } from './utils/shutdown.js';
import { WorkflowFiles } from './workflow/files.js';
import { findWorkflow, loadWorkflowDocument } from './workflow/loader.js';
import { SessionMonitor } from './workflow/monitor.js';
import { RunStore } from './workflow/run-store.js';
import { WorkflowRunner } from './workflow/runner.js';

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  const document = await loadWorkflowDocument(options.workflowsFile);

  if (options.list) {
    for (const workflow of document.workflows) {
      console.log(`${workflow.id}\t${workflow.name}\t${workflow.nodes.length} nodes`);
    }
    return;
  }
  if (options.help || !options.workflow) {
    console.log(USAGE);
    return;
  }

  const workflow = findWorkflow(document, options.workflow);
  if (!workflow) {
    console.error(`Workflow not found: ${options.workflow}`);
    process.exitCode = 1;
    return;
  }

  const [prompts, providers] = await Promise.all([
    loadPromptLibrary(options.promptsFile),
    loadProviders(options.providersFile),
  ]);
  const runStore = new RunStore(options.savesDir);
  const runner = new WorkflowRunner(workflow, {
    model: new OpenAiCompatibleClient(providers),
    prompts,
    runStore,
    files: new WorkflowFiles(options.filesDir),
  });
  const monitor = new SessionMonitor();
  monitor.attach(runner);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const shutdown = new GracefulShutdown();

  runner.onEvent(event => {
    const line = formatEvent(event);
    if (line !== null) {
      console.log(line);
    }
    if (event.type === 'input_requested') {
      rl.question(`${event.prompt} > `).then(
        answer => runner.submitInput(answer),
        error => logger.debug('Input prompt closed', { error: describeError(error) }),
      );
    }
  });

  shutdown.registerHandler(
    'save-session',
    async () => {
      runner.cancel();
      if ((await runner.whenSettled()) === 'suspended') {
        const filePath = await runner.save(options.slot);
        console.log(`Saved to ${filePath}`);
      }
    },
    100,
  );
  shutdown.registerHandler('close-input', () => rl.close());
  shutdown.install(['SIGTERM']);
  rl.on('SIGINT', () => {
    void shutdown.shutdown('Interrupted');
  });

  if (options.resume) {
    const resumed = await runner.resumeSlot(options.slot);
    if (!resumed) {
      console.log(`No saved session in slot '${options.slot}', starting a new one.`);
      runner.start(options.world);
    }
  } else {
    runner.start(options.world);
  }

  const status = await runner.whenSettled();
  if (shutdown.isShuttingDownNow()) {
    return;
  }

  rl.close();
  console.log(`\n${formatSummary(monitor.getSummary())}`);
  if (status === 'completed') {
    await runner.end();
  }
  process.exitCode = status === 'failed' ? 1 : 0;
}

main().catch(error => {
  console.error('Fatal error:', describeError(error));
  process.exit(1);
});
