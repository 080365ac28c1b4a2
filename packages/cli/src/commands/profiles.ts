import type { Command } from 'commander';
import { HARNESS_PROFILES, formatExperimentConfig, type HarnessProfile } from '@ballotbench/core';

export function describeProfile(profile: HarnessProfile): string[] {
  const range = ({ minMs, maxMs }: { minMs: number; maxMs: number }) =>
    minMs === maxMs ? `${minMs}ms` : `${minMs}-${maxMs}ms`;

  return [
    `${profile.name}: ${profile.description}`,
    `  cooldown ${profile.cooldownSeconds}s, sampling every ${profile.samplingIntervalSeconds}s, ` +
      `vote failure ${(profile.voteFailureProbability * 100).toFixed(0)}%, p95 via ${profile.percentilePolicy}`,
    `  simulated latency: query ${range(profile.queryLatency)}, vote ${range(profile.voteLatency)}`,
    ...profile.configurations.map((c, i) => `  ${String(i + 1).padStart(2)}. ${formatExperimentConfig(c)}`),
  ];
}

export function registerProfilesCommand(program: Command): void {
  program
    .command('profiles')
    .description('List the built-in harness profiles')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) => {
      const profiles = Object.values(HARNESS_PROFILES);
      if (opts.json) {
        console.log(JSON.stringify(profiles, null, 2));
        return;
      }
      for (const profile of profiles) {
        console.log(describeProfile(profile).join('\n'));
        console.log();
      }
    });
}
