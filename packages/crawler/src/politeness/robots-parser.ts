import type { RobotsGroup, RobotsPolicy, RobotsRule } from './types.js';

const LINE_SPLIT_REGEX = /\r\n|\r|\n/;
const REGEX_SPECIAL = /[.+?^${}()|[\]\\]/g;

export function buildAllowAllPolicy(): RobotsPolicy {
  return {
    isAllowed: () => true,
    source: 'allow-all',
  };
}

export function normalizeRulePath(rule: string): string {
  if (rule.startsWith('/') || rule.startsWith('*')) {
    return rule;
  }
  return `/${rule}`;
}

type CompiledRule = RobotsRule & { matcher: RegExp };

function compileRule(rule: RobotsRule): CompiledRule {
  const anchored = rule.pattern.endsWith('$');
  const body = anchored ? rule.pattern.slice(0, -1) : rule.pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(REGEX_SPECIAL, '\\$&'))
    .join('.*');

  return {
    ...rule,
    matcher: new RegExp(`^${source}${anchored ? '$' : ''}`),
  };
}

function pathOf(url: string): string | undefined {
  try {
    const parsed = new URL(url);
    return `${parsed.pathname}${parsed.search}`;
  } catch {
    return undefined;
  }
}

/**
 * Longest matching pattern wins; on equal length Allow wins. A path no rule
 * matches is allowed, and so is /robots.txt itself.
 */
function createEvaluator(rules: RobotsRule[]): (url: string) => boolean {
  const compiled = rules.map(compileRule);

  return (url: string): boolean => {
    const path = pathOf(url);
    if (path === undefined || path === '/robots.txt') {
      return true;
    }

    let best: CompiledRule | undefined;
    for (const rule of compiled) {
      if (!rule.matcher.test(path)) {
        continue;
      }

      if (
        !best ||
        rule.pattern.length > best.pattern.length ||
        (rule.pattern.length === best.pattern.length && rule.allow)
      ) {
        best = rule;
      }
    }

    return best ? best.allow : true;
  };
}

export function parseRobotsGroups(robotsText: string): RobotsGroup[] {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | undefined;
  let collectingAgents = false;

  const currentGroup = (): RobotsGroup => {
    if (!current) {
      current = { agents: ['*'], rules: [] };
      groups.push(current);
    }
    return current;
  };

  for (const rawLine of robotsText.split(LINE_SPLIT_REGEX)) {
    const line = rawLine.split('#', 1)[0]?.trim();
    if (!line) {
      continue;
    }

    const separator = line.indexOf(':');
    if (separator === -1) {
      continue;
    }

    const directive = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    switch (directive) {
      case 'user-agent': {
        if (!current || !collectingAgents) {
          current = { agents: [], rules: [] };
          groups.push(current);
        }
        current.agents.push(value.toLowerCase());
        collectingAgents = true;
        break;
      }

      case 'allow':
      case 'disallow': {
        const group = currentGroup();
        collectingAgents = false;
        // An empty Disallow allows everything; an empty Allow says nothing.
        if (value) {
          group.rules.push({
            allow: directive === 'allow',
            pattern: normalizeRulePath(value),
          });
        }
        break;
      }

      case 'crawl-delay': {
        const group = currentGroup();
        collectingAgents = false;
        const delaySeconds = Number.parseFloat(value);
        if (Number.isFinite(delaySeconds) && delaySeconds >= 0) {
          group.crawlDelayMs = delaySeconds * 1000;
        }
        break;
      }

      default:
        break;
    }
  }

  return groups;
}

/**
 * Groups that apply to `userAgent`: those naming the longest agent token
 * contained in it, merged; otherwise the `*` groups.
 */
export function selectAgentGroups(
  groups: RobotsGroup[],
  userAgent: string,
): RobotsGroup[] {
  const lowerUA = userAgent.toLowerCase();
  let bestLength = 0;
  let selected: RobotsGroup[] = [];

  for (const group of groups) {
    for (const agent of group.agents) {
      if (agent === '*' || !agent || !lowerUA.includes(agent)) {
        continue;
      }

      if (agent.length > bestLength) {
        bestLength = agent.length;
        selected = [group];
      } else if (agent.length === bestLength && !selected.includes(group)) {
        selected.push(group);
      }
    }
  }

  if (selected.length > 0) {
    return selected;
  }

  return groups.filter((group) => group.agents.includes('*'));
}

export function parseRobotsTxt(
  robotsText: string,
  userAgent: string,
): RobotsPolicy {
  const groups = selectAgentGroups(parseRobotsGroups(robotsText), userAgent);
  if (groups.length === 0) {
    return buildAllowAllPolicy();
  }

  const rules = groups.flatMap((group) => group.rules);
  const delays = groups
    .map((group) => group.crawlDelayMs)
    .filter((delay): delay is number => delay !== undefined);

  return {
    isAllowed: createEvaluator(rules),
    crawlDelayMs: delays.length > 0 ? Math.max(...delays) : undefined,
    source: 'robots.txt',
  };
}
