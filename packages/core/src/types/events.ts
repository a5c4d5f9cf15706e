// packages/core/src/types/events.ts

/**
 * Events emitted by the scan orchestrator and fix executor.
 * Consumed by the CLI for live progress rendering.
 */

import type { HealthRating, ScanStage } from './scan.js';

export interface ScanStartedEvent {
  type: 'scan.started';
  scanId: string;
  timestamp: string;
}

export interface StageStartedEvent {
  type: 'stage.started';
  stage: ScanStage;
  timestamp: string;
}

export interface StageCompletedEvent {
  type: 'stage.completed';
  stage: ScanStage;
  progress: number;
  durationMs: number;
  timestamp: string;
}

/** A category scanner failed; its findings were replaced by an empty snapshot. */
export interface StageDegradedEvent {
  type: 'stage.degraded';
  stage: ScanStage;
  error: string;
  timestamp: string;
}

export interface ScanCancelledEvent {
  type: 'scan.cancelled';
  stage: ScanStage;
  progress: number;
  timestamp: string;
}

export interface ScanFinalizedEvent {
  type: 'scan.finalized';
  scanId: string;
  healthScore: number;
  rating: HealthRating;
  recommendationCount: number;
  totalReclaimableSpace: number;
  timestamp: string;
}

export interface FixStartedEvent {
  type: 'fix.started';
  recommendationCount: number;
  timestamp: string;
}

export interface FixItemEvent {
  type: 'fix.item';
  path: string;
  ok: boolean;
  bytes: number;
  error?: string;
  timestamp: string;
}

export interface FixCompletedEvent {
  type: 'fix.completed';
  itemsFixed: number;
  spaceFreed: number;
  errors: number;
  cancelled: boolean;
  timestamp: string;
}

export type ScanEvent =
  | ScanStartedEvent
  | StageStartedEvent
  | StageCompletedEvent
  | StageDegradedEvent
  | ScanCancelledEvent
  | ScanFinalizedEvent
  | FixStartedEvent
  | FixItemEvent
  | FixCompletedEvent;

type WithoutTimestamp<E> = E extends unknown ? Omit<E, 'timestamp'> : never;

/** An event as handed to the bus; the bus stamps it when `timestamp` is absent. */
export type ScanEventInput = WithoutTimestamp<ScanEvent> & { timestamp?: string };
