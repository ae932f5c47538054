/**
 * Subtask Classifier
 *
 * Types a single plan step: the detected domain's own taxonomy first, then
 * the generic taxonomy, then the terminal type.
 */

import type { DomainProfile, SubtaskPattern } from '../shared/types/pipeline.js';
import type { DomainTable } from '../settings/types.js';

function firstMatch(lowered: string, taxonomy: readonly SubtaskPattern[]): string | undefined {
  return taxonomy.find((entry) => entry.patterns.some((p) => lowered.includes(p.toLowerCase())))?.type;
}

export class SubtaskClassifier {
  constructor(private readonly table: DomainTable) {}

  classify(text: string | null | undefined, domain?: DomainProfile | null): string {
    const lowered = (text ?? '').toLowerCase();

    if (domain) {
      const domainType = firstMatch(lowered, domain.subtasks);
      if (domainType !== undefined) {
        return domainType;
      }
    }

    return firstMatch(lowered, this.table.genericSubtasks) ?? this.table.terminalSubtaskType;
  }
}
