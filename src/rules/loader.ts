import { readFile } from 'node:fs/promises';
import { EmptyRuleSetError, InvalidRuleError, RulesSourceError, describeError } from '../common/errors';
import { getLogger } from '../common/logger';
import { Rule, RuleSet } from './types';

const log = getLogger('rules');

/**
 * Compile one rule line. The global flag is always set so that every match in
 * a file is replaced, not only the first.
 */
export function compileRule(description: string): Rule {
  const pattern = new RegExp(description, 'g');
  return Object.freeze({ description, pattern });
}

export function parseRuleSet(contents: string, sourceName: string): RuleSet {
  const rules: Rule[] = [];
  const lines = contents.split(/\r\n|\r|\n/);

  lines.forEach((line, index) => {
    const ruleText = line.trim();
    if (ruleText === '' || ruleText.startsWith('#')) {
      return;
    }
    try {
      rules.push(compileRule(ruleText));
    } catch (error) {
      throw new InvalidRuleError(sourceName, index + 1, ruleText, describeError(error));
    }
  });

  if (rules.length === 0) {
    throw new EmptyRuleSetError(sourceName);
  }

  return Object.freeze({ source: sourceName, rules: Object.freeze(rules) });
}

export async function loadRuleSet(path: string): Promise<RuleSet> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch (error) {
    throw new RulesSourceError(path, error);
  }

  const ruleSet = parseRuleSet(contents, path);
  log.info(`Loaded ${ruleSet.rules.length} sanitization rules`, { path });
  return ruleSet;
}
