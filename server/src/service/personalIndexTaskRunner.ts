import pLimit from 'p-limit';
import { logger as defaultLogger, type Logger } from '../logger';
import type {
  CalculationOutcome,
  FetchRequestData,
  PersonalIndexCalculation,
  PersonalIndexTaskSnapshot,
  PersonalIndexTaskStatus,
  PersonalIndexTaskStore,
  ReportResult,
  RequestData,
  RequestIdentifier,
  ResultDeliveryStatus,
} from '../model/personalIndex';
import {
  describeError,
  FetchError,
  TaskRunnerClosedError,
  UnexpectedTaskError,
} from './errors';
import { calculatePersonalIndex } from './indexCalculator';
import { createInMemoryTaskStore } from './personalIndexTaskStore';

const LOG_PREFIX = '[personal-cpi]';

export type TaskLogger = Pick<Logger, 'log' | 'warn' | 'error' | 'debug'>;

export interface PersonalIndexTaskRunnerDeps {
  fetchRequestData: FetchRequestData;
  reportResult: ReportResult;
  taskStore?: PersonalIndexTaskStore;
  calculate?: (
    requestId: RequestIdentifier,
    data: RequestData
  ) => PersonalIndexCalculation;
  /** Number of tasks allowed to run at once. */
  concurrency?: number;
  /** Pause before fetching, simulating a long-running computation. */
  simulatedDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: TaskLogger;
}

export interface PersonalIndexTaskRunner {
  submit(requestId: RequestIdentifier): PersonalIndexTaskSnapshot;
  getTask(taskId: string): PersonalIndexTaskSnapshot | null;
  onIdle(): Promise<void>;
  shutdown(): Promise<void>;
  readonly activeCount: number;
  readonly pendingCount: number;
  readonly closed: boolean;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

const failureOutcome = (requestId: RequestIdentifier): CalculationOutcome => ({
  id: requestId,
  success: false,
});

export const createPersonalIndexTaskRunner = ({
  fetchRequestData,
  reportResult,
  taskStore = createInMemoryTaskStore(),
  calculate = calculatePersonalIndex,
  concurrency = 1,
  simulatedDelayMs = 30_000,
  sleep = defaultSleep,
  logger = defaultLogger,
}: PersonalIndexTaskRunnerDeps): PersonalIndexTaskRunner => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `concurrency must be a positive integer (received ${concurrency})`
    );
  }

  const limit = pLimit(concurrency);
  const inflight = new Set<Promise<void>>();
  let closed = false;

  const deliver = async (
    taskId: string,
    outcome: CalculationOutcome
  ): Promise<ResultDeliveryStatus> => {
    const context = { taskId, requestId: outcome.id };
    try {
      await reportResult(outcome);
      logger.log(
        `${LOG_PREFIX} Successfully sent personal CPI results for request ${outcome.id}`,
        context
      );
      return 'DELIVERED';
    } catch (error) {
      logger.error(
        `${LOG_PREFIX} Error sending results for request ${outcome.id}:`,
        context,
        describeError(error)
      );
      return 'FAILED';
    }
  };

  const computeOutcome = async (
    taskId: string,
    requestId: RequestIdentifier
  ): Promise<{
    outcome: CalculationOutcome;
    status: PersonalIndexTaskStatus;
    error?: string;
  }> => {
    const context = { taskId, requestId };
    try {
      await sleep(simulatedDelayMs);
      const data = await fetchRequestData(requestId);
      logger.log(
        `${LOG_PREFIX} Request ${requestId}: found ${data.categories.length} categories, comparisonDate: ${data.comparisonDate}`,
        context
      );

      const calculation = calculate(requestId, data);
      for (const contribution of calculation.contributions) {
        logger.debug(
          `${LOG_PREFIX} Category ${contribution.categoryId}: weight=${contribution.weight.toFixed(4)}, change=${contribution.change.toFixed(4)}`,
          context
        );
      }

      if (calculation.failureReason) {
        logger.warn(
          `${LOG_PREFIX} No personal CPI for request ${requestId} (${calculation.failureReason})`,
          { ...context, totalSpent: calculation.totalSpent }
        );
      } else {
        logger.log(
          `${LOG_PREFIX} Request ${requestId}: calculated personalCPI = ${calculation.outcome.personalIndex}%`,
          context
        );
      }

      return { outcome: calculation.outcome, status: 'COMPLETED' };
    } catch (error) {
      if (error instanceof FetchError) {
        logger.error(`${LOG_PREFIX} ${error.message}`, {
          ...context,
          kind: error.kind,
          status: error.status ?? null,
          responseText: error.responseText ?? null,
        });
        return {
          outcome: failureOutcome(requestId),
          status: 'FAILED',
          error: error.message,
        };
      }

      const unexpected = new UnexpectedTaskError(requestId, error);
      logger.error(`${LOG_PREFIX} ${unexpected.message}`, context, error);
      return {
        outcome: failureOutcome(requestId),
        status: 'FAILED',
        error: unexpected.message,
      };
    }
  };

  const runTask = async (taskId: string, requestId: RequestIdentifier) => {
    if (closed) {
      // cancelled by shutdown() while waiting in the queue
      return;
    }

    taskStore.update(taskId, { status: 'RUNNING', startedAt: new Date() });
    logger.log(`${LOG_PREFIX} Task started for request ${requestId}`, {
      taskId,
      requestId,
    });

    const { outcome, status, error } = await computeOutcome(taskId, requestId);
    taskStore.update(taskId, { outcome });

    const delivery = await deliver(taskId, outcome);

    taskStore.update(taskId, {
      status,
      delivery,
      error,
      completedAt: new Date(),
    });
    logger.log(
      `${LOG_PREFIX} Task ${status.toLowerCase()} for request ${requestId}`,
      { taskId, requestId, success: outcome.success, delivery }
    );
  };

  const track = (promise: Promise<void>) => {
    inflight.add(promise);
    void promise.then(() => {
      inflight.delete(promise);
    });
  };

  const onIdle = async () => {
    while (inflight.size > 0) {
      await Promise.all([...inflight]);
    }
  };

  const markAborted = (
    taskId: string,
    requestId: RequestIdentifier,
    error: unknown
  ) => {
    logger.error(
      `${LOG_PREFIX} Task for request ${requestId} aborted:`,
      { taskId, requestId },
      error
    );
    if (!taskStore.get(taskId)) return;
    taskStore.update(taskId, {
      status: 'FAILED',
      delivery: 'SKIPPED',
      error: describeError(error),
      completedAt: new Date(),
    });
  };

  return {
    submit(requestId: RequestIdentifier): PersonalIndexTaskSnapshot {
      if (closed) {
        throw new TaskRunnerClosedError();
      }

      const snapshot = taskStore.enqueue(requestId);

      const execution = limit(() => runTask(snapshot.taskId, requestId)).catch(
        (error: unknown) => markAborted(snapshot.taskId, requestId, error)
      );
      track(execution);

      logger.log(`${LOG_PREFIX} Async task queued for request ${requestId}`, {
        taskId: snapshot.taskId,
        requestId,
      });
      return snapshot;
    },

    getTask(taskId: string) {
      return taskStore.get(taskId);
    },

    onIdle,

    async shutdown() {
      if (!closed) {
        closed = true;
        const cancelledAt = new Date();
        const waiting = taskStore.listByStatus('QUEUED');
        for (const task of waiting) {
          taskStore.update(task.taskId, {
            status: 'CANCELLED',
            delivery: 'SKIPPED',
            completedAt: cancelledAt,
          });
        }
        if (waiting.length > 0) {
          logger.warn(
            `${LOG_PREFIX} Cancelled ${waiting.length} queued task(s) on shutdown`
          );
        }
      }
      await onIdle();
    },

    get activeCount() {
      return limit.activeCount;
    },

    get pendingCount() {
      return limit.pendingCount;
    },

    get closed() {
      return closed;
    },
  };
};
