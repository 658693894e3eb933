type RobotsRule = {
  allow: boolean;
  pattern: string;
};

type RobotsGroup = {
  agents: string[];
  rules: RobotsRule[];
  crawlDelayMs?: number;
};

type RobotsPolicy = {
  isAllowed: (url: string) => boolean;
  crawlDelayMs?: number;
  source: 'robots.txt' | 'allow-all';
};

export type { RobotsGroup, RobotsPolicy, RobotsRule };
