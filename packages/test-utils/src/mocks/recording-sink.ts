/**
 * Recording collaborators for asserting on search events
 */

import type { Edge, EdgeStatus, EventSink, SearchObserver } from '@gsearch/core';
import { vi } from 'vitest';

/**
 * One batch received by an event sink
 */
export interface RecordedEvent<S> {
  status: EdgeStatus;
  edges: Edge<S>[];
}

/**
 * Event sink that keeps every batch it receives
 */
export interface RecordingSink<S> {
  /** Pass this as the search's eventSink */
  sink: EventSink<S>;

  /** Batches in arrival order */
  events: RecordedEvent<S>[];

  /** Statuses in arrival order */
  statuses(): EdgeStatus[];

  /** Edge batches received with the given status */
  edgesFor(status: EdgeStatus): Edge<S>[][];

  /** Forget recorded batches */
  reset(): void;
}

/**
 * Create a vi.fn-backed event sink that records events
 */
export function createRecordingSink<S>(): RecordingSink<S> {
  const events: RecordedEvent<S>[] = [];

  const sink = vi.fn((edges: Edge<S>[], status: EdgeStatus): void => {
    events.push({ status, edges });
  });

  return {
    sink,
    events,
    statuses: () => events.map((event) => event.status),
    edgesFor: (status) =>
      events.filter((event) => event.status === status).map((event) => event.edges),
    reset: () => {
      events.length = 0;
      sink.mockClear();
    },
  };
}

/**
 * Observer hook name
 */
export type ObserverHook = keyof SearchObserver<unknown>;

/**
 * Observer whose hooks are vi.fn mocks that log their calls
 */
export interface TrackingObserver<S> {
  observer: Required<SearchObserver<S>>;
  calls: Array<{ hook: ObserverHook; args: unknown[] }>;

  /** Hook names in call order */
  hooks(): ObserverHook[];
}

/**
 * Create an observer that tracks every hook call
 */
export function createTrackingObserver<S>(): TrackingObserver<S> {
  const calls: Array<{ hook: ObserverHook; args: unknown[] }> = [];

  const track =
    (hook: ObserverHook): ((...args: unknown[]) => void) =>
    (...args: unknown[]): void => {
      calls.push({ hook, args });
    };

  const observer: Required<SearchObserver<S>> = {
    onStart: vi.fn(track('onStart')),
    onExpand: vi.fn(track('onExpand')),
    onExpansion: vi.fn(track('onExpansion')),
    onSolution: vi.fn(track('onSolution')),
    onFailure: vi.fn(track('onFailure')),
  };

  return {
    observer,
    calls,
    hooks: () => calls.map((call) => call.hook),
  };
}
