import { randomUUID } from 'node:crypto';
import type {
  PersonalIndexTaskSnapshot,
  PersonalIndexTaskStatus,
  PersonalIndexTaskStore,
  PersonalIndexTaskUpdate,
  RequestIdentifier,
} from '../model/personalIndex';

const TERMINAL_STATUSES: ReadonlySet<PersonalIndexTaskStatus> = new Set([
  'COMPLETED',
  'FAILED',
  'CANCELLED',
]);

export const isTerminalStatus = (status: PersonalIndexTaskStatus): boolean =>
  TERMINAL_STATUSES.has(status);

const cloneSnapshot = (
  snapshot: PersonalIndexTaskSnapshot
): PersonalIndexTaskSnapshot => ({
  ...snapshot,
  submittedAt: new Date(snapshot.submittedAt),
  startedAt: snapshot.startedAt ? new Date(snapshot.startedAt) : undefined,
  completedAt: snapshot.completedAt
    ? new Date(snapshot.completedAt)
    : undefined,
  outcome: snapshot.outcome ? { ...snapshot.outcome } : undefined,
});

const ensureTask = (
  tasks: Map<string, PersonalIndexTaskSnapshot>,
  taskId: string
): PersonalIndexTaskSnapshot => {
  const task = tasks.get(taskId);
  if (!task) {
    throw new Error(`Task not found: ${taskId}`);
  }
  return task;
};

interface InMemoryTaskStoreOptions {
  /** Finished snapshots kept before the oldest are evicted. */
  historyLimit?: number;
}

export const createInMemoryTaskStore = (
  options: InMemoryTaskStoreOptions = {}
): PersonalIndexTaskStore => {
  const historyLimit = options.historyLimit ?? 1000;
  const tasks = new Map<string, PersonalIndexTaskSnapshot>();
  // finished task ids in completion order
  const finished: string[] = [];

  const recordFinished = (taskId: string) => {
    finished.push(taskId);
    while (finished.length > historyLimit) {
      const evicted = finished.shift();
      if (evicted !== undefined) tasks.delete(evicted);
    }
  };

  return {
    enqueue(requestId: RequestIdentifier): PersonalIndexTaskSnapshot {
      const snapshot: PersonalIndexTaskSnapshot = {
        taskId: randomUUID(),
        requestId,
        status: 'QUEUED',
        delivery: 'PENDING',
        submittedAt: new Date(),
      };
      tasks.set(snapshot.taskId, snapshot);
      return cloneSnapshot(snapshot);
    },

    update(taskId: string, update: PersonalIndexTaskUpdate): void {
      const current = ensureTask(tasks, taskId);
      const next: PersonalIndexTaskSnapshot = {
        ...current,
        ...update,
        taskId: current.taskId,
        requestId: current.requestId,
        submittedAt: current.submittedAt,
      };
      if (update.startedAt) {
        next.startedAt = new Date(update.startedAt);
      }
      if (update.completedAt) {
        next.completedAt = new Date(update.completedAt);
      }
      if (update.outcome) {
        next.outcome = { ...update.outcome };
      }
      tasks.set(taskId, next);

      if (!isTerminalStatus(current.status) && isTerminalStatus(next.status)) {
        recordFinished(taskId);
      }
    },

    get(taskId: string): PersonalIndexTaskSnapshot | null {
      const snapshot = tasks.get(taskId);
      return snapshot ? cloneSnapshot(snapshot) : null;
    },

    listByStatus(status: PersonalIndexTaskStatus): PersonalIndexTaskSnapshot[] {
      return [...tasks.values()]
        .filter((snapshot) => snapshot.status === status)
        .map(cloneSnapshot);
    },
  };
};
