/**
 * Pool Monitor - builds the pool status from the pool's event stream only
 */

import {
  type PoolDegradedEvent,
  type PoolEvent,
  PoolEventType,
  type WorkerId,
  WorkerState,
  type WorkerTransitionEvent,
} from "../workers/types.js";

export interface WorkerStatus {
  id: WorkerId;
  instance: number;
  state: WorkerState;
  pid: number | null;
  restartCount: number;
  lastStartTime: number | null;
  lastRestartTime: number | null;
}

export interface PoolStatus {
  poolSize: number;
  ready: number;
  crashed: number;
  degraded: boolean;
  workers: WorkerStatus[];
}

export class PoolMonitor {
  /** Known worker instances by `${slot}:${instance}` */
  private instances: Map<string, WorkerStatus> = new Map();
  private lastDegraded: PoolDegradedEvent | null = null;

  constructor(private readonly poolSize: number) {}

  /** Consume a pool event stream until it ends */
  async follow(events: AsyncIterable<PoolEvent>): Promise<void> {
    for await (const event of events) {
      this.apply(event);
    }
  }

  apply(event: PoolEvent): void {
    if (event.type === PoolEventType.Degraded) {
      this.lastDegraded = event;
      return;
    }
    this.applyTransition(event);
  }

  get degradedEvent(): PoolDegradedEvent | null {
    return this.lastDegraded;
  }

  snapshot(): PoolStatus {
    const workers = [...this.instances.values()].sort((a, b) => a.id - b.id || a.instance - b.instance);
    return {
      poolSize: this.poolSize,
      ready: workers.filter((w) => w.state === WorkerState.Ready).length,
      crashed: workers.filter((w) => w.state === WorkerState.Crashed).length,
      degraded: this.lastDegraded !== null,
      workers: workers.map((w) => ({ ...w })),
    };
  }

  private applyTransition(event: WorkerTransitionEvent): void {
    const key = `${event.workerId}:${event.instance}`;
    const siblings = [...this.instances.entries()].filter(
      ([otherKey, status]) => status.id === event.workerId && otherKey !== key,
    );

    let status = this.instances.get(key);
    if (!status) {
      // a fresh launch of the slot inherits the slot's restart history
      const previous = siblings.at(-1)?.[1];
      status = {
        id: event.workerId,
        instance: event.instance,
        state: event.from,
        pid: null,
        restartCount: event.restartCount,
        lastStartTime: null,
        lastRestartTime: previous?.lastRestartTime ?? null,
      };
      this.instances.set(key, status);
    }

    status.state = event.to;
    status.restartCount = event.restartCount;
    if (event.pid !== undefined) {
      status.pid = event.pid;
    }

    if (event.to === WorkerState.Starting) {
      status.lastStartTime = event.timestamp;
      status.pid = event.pid ?? null;
      if (event.from === WorkerState.Crashed) {
        status.lastRestartTime = event.timestamp;
      }
      // earlier instances of this slot that are already down are superseded
      for (const [otherKey, other] of siblings) {
        if (other.state === WorkerState.Crashed || other.state === WorkerState.Stopped) {
          this.instances.delete(otherKey);
        }
      }
    }

    if (event.to === WorkerState.Stopped && siblings.length > 0) {
      this.instances.delete(key);
    }
  }
}
