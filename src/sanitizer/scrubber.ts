import type { Rule, RuleSet } from '../rules/types';
import type { ScrubOptions } from './types';

/**
 * Build the text that replaces one match. Lengths count code points so that
 * astral characters are not split or double counted.
 */
export function buildReplacement(matchedText: string, placeholder: string, maintainLength: boolean): string {
  if (!maintainLength) {
    return placeholder;
  }

  const matchLength = Array.from(matchedText).length;
  const placeholderChars = Array.from(placeholder);
  if (placeholderChars.length === 1) {
    return placeholder.repeat(matchLength);
  }

  // Longer placeholders are tiled; a match shorter than the placeholder gets a
  // truncated prefix and is not padded.
  const repetitions = Math.floor(matchLength / placeholderChars.length);
  const remainder = matchLength % placeholderChars.length;
  return placeholder.repeat(repetitions) + placeholderChars.slice(0, remainder).join('');
}

/**
 * Replace every non-overlapping match of `rule` in `input`. The replacement
 * is computed from each matched text alone; `$` sequences in the placeholder
 * are inserted literally.
 */
export function scrub(rule: Rule, input: string, placeholder: string, maintainLength: boolean): string {
  // replace() with a global pattern starts at index 0 and resets lastIndex when
  // done, so the shared compiled pattern carries no state between calls.
  return input.replace(rule.pattern, (matchedText: string) =>
    buildReplacement(matchedText, placeholder, maintainLength),
  );
}

export interface ScrubResult {
  output: string;
  /** Descriptions of the rules that changed the text, in rule order. */
  appliedRules: string[];
}

/** Thread the text through every rule in order; each rule sees the previous output. */
export function scrubAll(ruleSet: RuleSet, input: string, options: ScrubOptions): ScrubResult {
  let output = input;
  const appliedRules: string[] = [];

  for (const rule of ruleSet.rules) {
    const next = scrub(rule, output, options.placeholder, options.maintainLength);
    if (next !== output) {
      appliedRules.push(rule.description);
    }
    output = next;
  }

  return { output, appliedRules };
}
