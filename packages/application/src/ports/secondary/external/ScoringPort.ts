/**
 * @fileoverview Secondary Port - ScoringPort
 *
 * Intent scoring of a prospect profile, usually backed by a language model.
 *
 * @module application/ports/secondary/external/ScoringPort
 */

import type { ContactProfile } from '@leadflow/types';

export interface ScoringPort {
  /**
   * Buying-intent score in [0, 1]
   *
   * @throws ServiceError on transport or model failure
   */
  score(profile: ContactProfile): Promise<number>;
}
