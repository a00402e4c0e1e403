import { z } from 'zod';

import { config } from '../utils/config.js';
import { WorkflowValidationError } from '../utils/errors.js';
import { isContainedPath } from './files.js';
import type { LoopSettings, WorkflowDefinition, WorkflowDocument } from './types.js';

const loopFields = {
  loopPolicy: z.enum(['none', 'conditional']).default('none'),
  loopPrompt: z.string().default(''),
  maxIterations: z.number().int().positive().default(config.execution.defaultMaxIterations),
};

function requireLoopPrompt(value: LoopSettings, ctx: z.RefinementCtx): void {
  if (value.loopPolicy === 'conditional' && value.loopPrompt.trim() === '') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'a conditional loop needs a non-empty loopPrompt',
      path: ['loopPrompt'],
    });
  }
}

function requireUniqueIds(
  items: { id: string }[],
  label: string,
  path: string,
  ctx: z.RefinementCtx,
): void {
  const seen = new Set<string>();
  items.forEach((item, index) => {
    if (seen.has(item.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate ${label} id '${item.id}'`,
        path: [path, index, 'id'],
      });
    }
    seen.add(item.id);
  });
}

const workflowFilePath = z
  .string()
  .refine(isContainedPath, 'must be a relative path inside the workflow files directory');

const stepSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    prompt: z.string().default(''),
    executionMode: z.enum(['sequential', 'parallel']).default('sequential'),
    fragments: z.array(z.string().min(1)).default([]),
    fragmentLayout: z.enum(['ordered', 'sectioned']).default('ordered'),
    useContext: z.boolean().default(true),
    awaitPlayerInput: z.boolean().default(false),
    inputPrompt: z.string().optional(),
    placeholder: z.string().min(1).default('Continue.'),
    saveToContext: z.boolean().default(true),
    captureAs: z.string().min(1).optional(),
    readFromFile: workflowFilePath.optional(),
    saveToFile: workflowFilePath.optional(),
    provider: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
    ...loopFields,
  })
  .superRefine(requireLoopPrompt);

const nodeSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    steps: z.array(stepSchema),
    ...loopFields,
  })
  .superRefine((node, ctx) => {
    requireLoopPrompt(node, ctx);
    requireUniqueIds(node.steps, 'step', 'steps', ctx);
  });

export const workflowSchema: z.ZodType<WorkflowDefinition, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().optional(),
    entryNodeId: z.string().min(1).optional(),
    nodes: z.array(nodeSchema),
  })
  .superRefine((workflow, ctx) => {
    requireUniqueIds(workflow.nodes, 'node', 'nodes', ctx);
    if (workflow.entryNodeId && !workflow.nodes.some(node => node.id === workflow.entryNodeId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `entryNodeId '${workflow.entryNodeId}' does not name a node`,
        path: ['entryNodeId'],
      });
    }
  });

export const workflowDocumentSchema: z.ZodType<WorkflowDocument, z.ZodTypeDef, unknown> = z
  .object({
    workflows: z.array(workflowSchema),
  })
  .superRefine((document, ctx) => {
    requireUniqueIds(document.workflows, 'workflow', 'workflows', ctx);
  });

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function parseWorkflowDocument(input: unknown): WorkflowDocument {
  const result = workflowDocumentSchema.safeParse(input);
  if (!result.success) {
    throw new WorkflowValidationError('Invalid workflow document', formatIssues(result.error));
  }
  return result.data;
}

export function parseWorkflow(input: unknown): WorkflowDefinition {
  const result = workflowSchema.safeParse(input);
  if (!result.success) {
    throw new WorkflowValidationError('Invalid workflow', formatIssues(result.error));
  }
  return result.data;
}
