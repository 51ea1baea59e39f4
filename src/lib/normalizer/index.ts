/**
 * Normalizer module - collapses date-valued path segments into stable,
 * position-qualified placeholders
 */

import type { StructuralPath } from "../../types/data-model.js";
import type { DateFormatName } from "../../types/config.js";
import type { NormalizerOptions, DateKeyMatch } from "./types.js";
import {
  DATE_GRAMMARS,
  DATE_FORMAT_NAMES,
  compileGrammar,
  matchesGrammar,
  type CompiledDateGrammar,
} from "./date-patterns.js";
import { joinPath, splitPath } from "./path.js";
import { ConfigError } from "../../utils/errors.js";

export * from "./types.js";
export * from "./path.js";
export * from "./date-patterns.js";

/**
 * Placeholder that replaces a date segment, e.g. "yyyy-mm-dd_1"
 */
export function dateToken(format: DateFormatName, position: number): string {
  return `${format}_${position}`;
}

/**
 * Resolve grammar names to compiled grammars, keeping the caller's order
 */
export function resolveGrammars(
  names: readonly DateFormatName[] = DATE_FORMAT_NAMES,
): CompiledDateGrammar[] {
  return names.map((name) => {
    const grammar = DATE_GRAMMARS.find((g) => g.name === name);
    if (!grammar) {
      throw new ConfigError(`Unknown date format: ${name}`, {
        supported: [...DATE_FORMAT_NAMES],
      });
    }
    return compileGrammar(grammar);
  });
}

/**
 * Main path normalizer class
 */
export class PathNormalizer {
  private grammars: CompiledDateGrammar[];

  constructor(options: NormalizerOptions = {}) {
    this.grammars = resolveGrammars(options.dateFormats);
  }

  /**
   * Return the first grammar a key matches, or null
   */
  detectDateFormat(key: string): DateFormatName | null {
    const grammar = this.grammars.find((g) => matchesGrammar(key, g));
    return grammar ? grammar.name : null;
  }

  /**
   * Rewrite every date segment of a path to its placeholder token
   *
   * @example
   * normalizer.normalize("matches.2021-11-08") // "matches.yyyy-mm-dd_1"
   */
  normalize(path: StructuralPath): StructuralPath {
    return joinPath(this.normalizeSegments(path).segments);
  }

  /**
   * Normalize a path and report which segments were replaced
   */
  normalizeSegments(path: StructuralPath): {
    segments: string[];
    matches: DateKeyMatch[];
  } {
    const segments: string[] = [];
    const matches: DateKeyMatch[] = [];

    for (const segment of splitPath(path)) {
      const format = this.detectDateFormat(segment);
      if (format) {
        const token = dateToken(format, segments.length);
        matches.push({ format, position: segments.length, token });
        segments.push(token);
      } else {
        segments.push(segment);
      }
    }

    return { segments, matches };
  }
}

const defaultNormalizer = new PathNormalizer();

/**
 * Normalize a path with the built-in grammars
 */
export function normalizePath(path: StructuralPath): StructuralPath {
  return defaultNormalizer.normalize(path);
}
