import { logger } from '../utils/logger.js';
import type { EngineEvent, EventCallback, LoopScope, RunStatus } from './types.js';

export interface NodeMetrics {
  nodeId: string;
  passes: number;
  replies: number;
  firstEnteredAt: string;
}

export interface SessionSummary {
  sessionId: string | null;
  status: RunStatus;
  startedAt?: string;
  finishedAt?: string;
  duration?: number;
  nodesEntered: number;
  replies: number;
  loopIterations: Record<LoopScope, number>;
  boundWarnings: number;
  inputRequests: number;
  failureReason?: string;
}

interface EventSource {
  onEvent(callback: EventCallback): () => void;
}

/**
 * Tallies a session from its event stream. A resumed session keeps adding
 * to the same counts.
 */
export class SessionMonitor {
  private sessionId: string | null = null;
  private status: RunStatus = 'idle';
  private startedAt?: string;
  private finishedAt?: string;
  private failureReason?: string;
  private nodes: Map<string, NodeMetrics> = new Map();
  private replies = 0;
  private loopIterations: Record<LoopScope, number> = { node: 0, step: 0 };
  private boundWarnings = 0;
  private inputRequests = 0;

  attach(runner: EventSource): () => void {
    return runner.onEvent(event => this.record(event));
  }

  record(event: EngineEvent): void {
    switch (event.type) {
      case 'session_started':
        this.sessionId = event.sessionId;
        this.status = 'running';
        this.startedAt ??= event.timestamp;
        this.finishedAt = undefined;
        break;
      case 'node_entered': {
        const metrics = this.nodes.get(event.nodeId);
        if (metrics) {
          metrics.passes++;
        } else {
          this.nodes.set(event.nodeId, { nodeId: event.nodeId, passes: 1, replies: 0, firstEnteredAt: event.timestamp });
        }
        break;
      }
      case 'step_completed': {
        this.replies++;
        const metrics = this.nodes.get(event.nodeId);
        if (metrics) metrics.replies++;
        break;
      }
      case 'loop_iterated':
        this.loopIterations[event.scope]++;
        break;
      case 'loop_bound_exceeded':
        this.boundWarnings++;
        break;
      case 'input_requested':
        this.inputRequests++;
        break;
      case 'suspended':
      case 'completed':
        this.finish(event.type, event.timestamp);
        break;
      case 'failed':
        this.failureReason = event.reason;
        this.finish('failed', event.timestamp);
        break;
      case 'step_started':
        break;
    }
  }

  private finish(status: RunStatus, timestamp: string): void {
    this.status = status;
    this.finishedAt = timestamp;
    logger.debug(`[METRICS] Session ${status}`, { sessionId: this.sessionId, replies: this.replies });
  }

  getNodeMetrics(nodeId: string): NodeMetrics | null {
    return this.nodes.get(nodeId) ?? null;
  }

  getSummary(): SessionSummary {
    const duration =
      this.startedAt && this.finishedAt
        ? new Date(this.finishedAt).getTime() - new Date(this.startedAt).getTime()
        : undefined;

    return {
      sessionId: this.sessionId,
      status: this.status,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      duration,
      nodesEntered: Array.from(this.nodes.values()).reduce((sum, node) => sum + node.passes, 0),
      replies: this.replies,
      loopIterations: { ...this.loopIterations },
      boundWarnings: this.boundWarnings,
      inputRequests: this.inputRequests,
      failureReason: this.failureReason,
    };
  }
}
