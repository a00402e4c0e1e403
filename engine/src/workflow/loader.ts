import { readFile } from 'fs/promises';

import { WorkflowValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parseWorkflowDocument } from './schema.js';
import type { WorkflowDefinition, WorkflowDocument } from './types.js';

/**
 * Reads the editor's workflow file. The engine never writes it back.
 */
export async function loadWorkflowDocument(filePath: string): Promise<WorkflowDocument> {
  const content = await readFile(filePath, 'utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new WorkflowValidationError(`Workflow file is not valid JSON: ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const document = parseWorkflowDocument(raw);
  logger.debug('Loaded workflow document', { filePath, workflows: document.workflows.length });
  return document;
}

export function findWorkflow(document: WorkflowDocument, idOrName: string): WorkflowDefinition | null {
  return (
    document.workflows.find(workflow => workflow.id === idOrName) ??
    document.workflows.find(workflow => workflow.name === idOrName) ??
    null
  );
}
