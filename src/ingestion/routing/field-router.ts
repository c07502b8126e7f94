import { Injectable, Logger } from '@nestjs/common';
import { FIELD_RULES, FieldRoute, FieldRule } from './field-rules';

/**
 * Per-crane overrides: lowercase incoming field name -> canonical field name.
 */
export type FieldOverrides = ReadonlyMap<string, string>;

/**
 * FieldRouter - resolves payload field names to measurement slots.
 *
 * Generic routing is ordered, case-insensitive substring containment over
 * FIELD_RULES. Results are memoized per lowercase field name. A crane's
 * active field mapping (exact name match) is consulted first and resolved
 * against the rule terms exactly.
 */
@Injectable()
export class FieldRouter {
  private readonly logger = new Logger(FieldRouter.name);
  private readonly rules: readonly FieldRule[];
  private readonly byTerm: ReadonlyMap<string, FieldRoute>;
  private readonly memo = new Map<string, FieldRoute | null>();

  /** Memo is cleared past this size; field names come from untrusted payloads */
  private readonly MEMO_LIMIT = 1024;

  constructor() {
    this.rules = FIELD_RULES.map((rule) => ({
      term: rule.term.toLowerCase(),
      route: rule.route,
    }));
    this.byTerm = new Map(this.rules.map((rule) => [rule.term, rule.route]));
  }

  /**
   * @returns The route, or null when the field maps to no measurement
   */
  route(fieldName: string, overrides?: FieldOverrides): FieldRoute | null {
    const key = fieldName.toLowerCase();

    const mapped = overrides?.get(key);
    if (mapped !== undefined) {
      const route = this.byTerm.get(mapped.toLowerCase());
      if (route) {
        return route;
      }
      this.logger.warn(
        `Field mapping '${fieldName}' -> '${mapped}' names no known field, using generic routing`,
      );
    }

    const cached = this.memo.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const route = this.rules.find((rule) => key.includes(rule.term))?.route;
    if (this.memo.size >= this.MEMO_LIMIT) {
      this.memo.clear();
    }
    this.memo.set(key, route ?? null);
    return route ?? null;
  }
}
