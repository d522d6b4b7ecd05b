/**
 * Base types and matchers for behavioral state mocks.
 *
 * A state mock is a regular implementation of a service interface whose
 * in-memory state is reachable through a `$` property. Tests assert on that
 * state with custom matchers instead of counting calls.
 *
 * @example
 * const httpClient = createMockHttpClient();
 * const before = httpClient.$.snapshot();
 *
 * await service.doNothingNetworky();
 *
 * expect(httpClient).toBeUnchanged(before);
 */

import { expect } from "vitest";

/**
 * Opaque capture of mock state for later comparison.
 */
export interface Snapshot {
  readonly __brand: "Snapshot";
  readonly value: string;
}

/**
 * State carried by every behavioral mock.
 */
export interface MockState {
  /** Capture current state */
  snapshot(): Snapshot;
  /** Human-readable, deterministic representation of the state */
  toString(): string;
}

/**
 * A mock exposing its state through `$`.
 */
export interface MockWithState<S extends MockState> {
  readonly $: S;
}

export interface MatcherResult {
  readonly pass: boolean;
  readonly message: () => string;
}

/**
 * Matcher implementations for a matcher interface, with the mock as received value.
 */
export type MatcherImplementationsFor<
  M,
  T extends { [K in keyof T]: (...args: never[]) => void },
> = {
  [K in keyof T]: (received: M, ...args: Parameters<T[K]>) => MatcherResult;
};

/**
 * Create a snapshot from a state's string representation.
 */
export function createSnapshot(value: string): Snapshot {
  return { __brand: "Snapshot", value };
}

interface BaseMatchers {
  /**
   * Assert that the mock's state equals a previously taken snapshot.
   */
  toBeUnchanged(snapshot: Snapshot): void;
}

declare module "vitest" {
  interface Assertion<T> extends BaseMatchers {}
}

export const baseMatchers: MatcherImplementationsFor<MockWithState<MockState>, BaseMatchers> = {
  toBeUnchanged(received, snapshot) {
    const current = received.$.toString();
    const pass = current === snapshot.value;
    return {
      pass,
      message: () =>
        pass
          ? "Expected mock state to have changed"
          : `Expected mock state to be unchanged.\n\nBefore:\n${snapshot.value}\n\nAfter:\n${current}`,
    };
  },
};

expect.extend(baseMatchers);
