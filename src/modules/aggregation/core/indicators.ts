import { err, ok, type Result } from 'neverthrow';

import { createConfigurationError, type ConfigurationError } from './errors.js';

import type { IndicatorDefinition, ResponseRow, SignalSpec } from './types.js';

/**
 * Signal-name suffix of the composite "any choice selected" series.
 */
export const ANY_CHOICE_LABEL = 'any';

const REQUIRED_GROUPING = ['day', 'geo'] as const;

const readColumn = (row: ResponseRow, column: string): number | null => {
  const value = row.values[column];
  return value === undefined || value === null || !Number.isFinite(value) ? null : value;
};

/**
 * Output series of an indicator, in a fixed order.
 */
export function expandSignals(indicator: IndicatorDefinition): SignalSpec[] {
  switch (indicator.kind) {
    case 'mean':
    case 'binary_percentage': {
      const column = indicator.signalColumn;
      return [
        {
          name: indicator.name,
          indicator,
          statistic: indicator.kind,
          extract: (row) => readColumn(row, column),
        },
      ];
    }
    case 'multiselect_percentage': {
      const signals: SignalSpec[] = indicator.choices.map((choice) => ({
        name: `${indicator.name}_${choice.label}`,
        indicator,
        statistic: 'binary_percentage',
        extract: (row) => readColumn(row, choice.column),
      }));

      if (indicator.compositeAny) {
        const columns = indicator.choices.map((choice) => choice.column);
        signals.push({
          name: `${indicator.name}_${ANY_CHOICE_LABEL}`,
          indicator,
          statistic: 'binary_percentage',
          extract: (row) => {
            const answers = columns
              .map((column) => readColumn(row, column))
              .filter((value): value is number => value !== null);
            if (answers.length === 0) return null;
            // An out-of-range answer passes through so it is counted as invalid
            const invalid = answers.find((value) => value !== 0 && value !== 1);
            if (invalid !== undefined) return invalid;
            return answers.some((value) => value === 1) ? 1 : 0;
          },
        });
      }
      return signals;
    }
  }
}

const referencedColumns = (indicator: IndicatorDefinition): string[] => {
  const signalColumns =
    indicator.kind === 'multiselect_percentage'
      ? indicator.choices.map((choice) => choice.column)
      : [indicator.signalColumn];
  return [...signalColumns, indicator.weightColumn];
};

/**
 * Checks indicator definitions against the loaded table and each other.
 *
 * Runs before any computation; every problem found is reported at once.
 *
 * @returns The expanded signals of all indicators, in definition order
 */
export function validateIndicators(
  indicators: readonly IndicatorDefinition[],
  columns: readonly string[]
): Result<SignalSpec[], ConfigurationError> {
  const problems: string[] = [];
  const available = new Set(columns);

  if (indicators.length === 0) {
    problems.push('at least one indicator must be defined');
  }

  for (const indicator of indicators) {
    const label = `indicator '${indicator.name}'`;

    for (const column of referencedColumns(indicator)) {
      if (!available.has(column)) {
        problems.push(`${label} references missing column '${column}'`);
      }
    }

    const grouping = new Set(indicator.groupBy);
    if (
      grouping.size !== indicator.groupBy.length ||
      grouping.size !== REQUIRED_GROUPING.length ||
      !REQUIRED_GROUPING.every((dimension) => grouping.has(dimension))
    ) {
      problems.push(
        `${label} must group by exactly day and geo, got [${indicator.groupBy.join(', ')}]`
      );
    }

    if (!Number.isInteger(indicator.smoothingWindowDays) || indicator.smoothingWindowDays < 1) {
      problems.push(`${label} smoothing window must be a positive whole number of days`);
    }

    if (indicator.kind === 'mean' && indicator.post === 'jeffreys') {
      problems.push(`${label} applies the Jeffreys adjustment to a non-percentage statistic`);
    }

    if (indicator.kind === 'multiselect_percentage') {
      if (indicator.choices.length === 0) {
        problems.push(`${label} has no choices`);
      }
      const labels = indicator.choices.map((choice) => choice.label);
      if (new Set(labels).size !== labels.length) {
        problems.push(`${label} repeats a choice label`);
      }
      if (indicator.compositeAny && labels.includes(ANY_CHOICE_LABEL)) {
        problems.push(`${label} uses the reserved choice label '${ANY_CHOICE_LABEL}'`);
      }
    }
  }

  const signals = indicators.flatMap(expandSignals);
  const seen = new Set<string>();
  for (const signal of signals) {
    if (seen.has(signal.name)) {
      problems.push(`signal name '${signal.name}' is produced more than once`);
    }
    seen.add(signal.name);
  }

  if (problems.length > 0) {
    return err(createConfigurationError('Invalid indicator definitions', problems));
  }
  return ok(signals);
}
