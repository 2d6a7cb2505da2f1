/**
 * Shared types for the state mock pattern.
 *
 * A state mock is a behavioral fake of an injectable interface that exposes its
 * internal state through a `$` property. Assertions are written as custom
 * matchers that read `$` instead of inspecting call arguments.
 *
 * Importing this module registers the base `toBeUnchanged` matcher.
 */

import { expect } from "vitest";

// =============================================================================
// Core Types
// =============================================================================

/** Opaque captured state, compared by value. */
export interface Snapshot {
  readonly __brand: "Snapshot";
  readonly value: string;
}

/** Base contract for every mock state object. */
export interface MockState {
  /** Capture current state for a later `toBeUnchanged` comparison. */
  snapshot(): Snapshot;
  /** Human-readable, deterministic rendering used in matcher messages. */
  toString(): string;
}

/** A mock exposing its state via `$`. */
export interface MockWithState<TState extends MockState> {
  readonly $: TState;
}

/** Result returned by a custom matcher. */
export interface MatcherResult {
  readonly pass: boolean;
  readonly message: () => string;
}

/**
 * Maps a matcher interface (as declared in the vitest augmentation) to the
 * implementation signatures expected by `expect.extend`.
 */
export type MatcherImplementationsFor<TReceived, TMatchers> = {
  [K in keyof TMatchers]: TMatchers[K] extends (...args: infer A) => void
    ? (received: TReceived, ...args: A) => MatcherResult
    : never;
};

// =============================================================================
// Base Matchers
// =============================================================================

interface BaseStateMatchers {
  /** Assert that the mock state equals a previously captured snapshot. */
  toBeUnchanged(snapshot: Snapshot): void;
}

declare module "vitest" {
  interface Assertion<T> extends BaseStateMatchers {}
}

function hasState(value: unknown): value is MockWithState<MockState> {
  return typeof value === "object" && value !== null && "$" in value;
}

export const baseStateMatchers = {
  toBeUnchanged(received: unknown, snapshot: Snapshot): MatcherResult {
    if (!hasState(received)) {
      return {
        pass: false,
        message: () => "toBeUnchanged expects a mock with a `$` state property",
      };
    }
    const current = received.$.snapshot().value;
    const pass = current === snapshot.value;
    return {
      pass,
      message: () =>
        pass
          ? `Expected state to have changed, but it is still:\n${current}`
          : `Expected state to be unchanged.\nBefore:\n${snapshot.value}\nAfter:\n${current}`,
    };
  },
};

expect.extend(baseStateMatchers);
