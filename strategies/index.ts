import {git} from "./git.ts";
import {githubLatest} from "./github-latest.ts";
import {gnu} from "./gnu.ts";
import {npm} from "./npm.ts";
import {pypi} from "./pypi.ts";
import {pageMatch} from "./page-match.ts";
import type {Strategy} from "./shared.ts";

export type {Strategy, StrategyContext, ExtractionResult, FindVersionsOpts} from "./shared.ts";

export type StrategyRegistry = {
  /** Sorted by descending priority, ties in declaration order */
  strategies: ReadonlyArray<Strategy>,
  byName: ReadonlyMap<string, Strategy>,
};

export type Selection = {
  strategy: Strategy | null,
  applicable: Array<Strategy>,
  /** Why no strategy is used for this url */
  reason?: string,
};

export const builtinStrategies: ReadonlyArray<Strategy> = [git, gnu, npm, pypi, pageMatch, githubLatest];

export function createRegistry(extra: Array<Strategy> = []): StrategyRegistry {
  const byName = new Map<string, Strategy>();
  for (const strategy of [...builtinStrategies, ...extra]) {
    if (byName.has(strategy.name)) throw new Error(`Duplicate strategy name: ${strategy.name}`);
    byName.set(strategy.name, strategy);
  }
  // Array.prototype.sort is stable
  const strategies = Object.freeze(Array.from(byName.values()).sort((a, b) => b.priority - a.priority));
  return Object.freeze({strategies, byName});
}

export function getStrategy(registry: StrategyRegistry, name: string): Strategy {
  const strategy = registry.byName.get(name);
  if (!strategy) throw new Error(`Unknown strategy: ${name}. Known strategies: ${Array.from(registry.byName.keys()).join(", ")}`);
  return strategy;
}

export function strategiesForUrl(registry: StrategyRegistry, url: string, regexProvided: boolean): Array<Strategy> {
  return registry.strategies.filter(strategy => {
    if (strategy.priority <= 0) return false;
    if (strategy.requiresRegex && !regexProvided) return false;
    return strategy.appliesTo(url);
  });
}

export function selectStrategy(registry: StrategyRegistry, url: string, {explicit, regexProvided}: {explicit: Strategy | null, regexProvided: boolean}): Selection {
  const applicable = strategiesForUrl(registry, url, regexProvided);
  if (explicit) {
    if (explicit.requiresRegex && !regexProvided) {
      return {strategy: null, applicable, reason: `${explicit.name} strategy requires a regex`};
    }
    if (!explicit.appliesTo(url)) {
      return {strategy: null, applicable, reason: `${explicit.name} strategy does not apply to this URL`};
    }
    return {strategy: explicit, applicable};
  }
  const [strategy] = applicable;
  return strategy ? {strategy, applicable} : {strategy: null, applicable, reason: "No strategy applies to this URL"};
}
