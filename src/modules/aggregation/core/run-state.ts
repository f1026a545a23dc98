import { err, ok, type Result } from 'neverthrow';

import { createInvalidStateError, type InvalidStateError } from '@/common/types/errors.js';

/**
 * Stages of a run, in the only order they may be entered.
 */
export const RUN_STAGES = [
  'LOADED',
  'RESOLVED',
  'COMPUTED',
  'MERGED',
  'POSTPROCESSED',
  'WRITTEN',
] as const;

export type RunStage = (typeof RUN_STAGES)[number];

export interface RunStateMachine {
  current(): RunStage;
  /**
   * Moves to `next`, which must be the stage directly after the current one.
   */
  advance(next: RunStage): Result<RunStage, InvalidStateError>;
}

export function createRunStateMachine(
  onTransition?: (from: RunStage, to: RunStage) => void
): RunStateMachine {
  let index = 0;

  const stageAt = (position: number): RunStage => RUN_STAGES[position] ?? 'LOADED';

  return {
    current() {
      return stageAt(index);
    },

    advance(next) {
      const from = stageAt(index);
      const expected = RUN_STAGES[index + 1];
      if (expected !== next) {
        return err(
          createInvalidStateError(
            `Cannot move run from ${from} to ${next}`,
            from,
            expected ?? 'none'
          )
        );
      }
      index += 1;
      onTransition?.(from, next);
      return ok(next);
    },
  };
}
