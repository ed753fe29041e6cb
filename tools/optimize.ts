/**
 * Average Finish Optimizer
 *
 * Reads a standings snapshot (standings.csv, leaderboards.csv, ranking.csv),
 * ranks every track variant by AF gained per centisecond, and plans how to
 * overtake the player one place above in the combined ranking.
 *
 * Usage:
 *   npx tsx tools/optimize.ts --data=snapshot --user=SomePlayer
 *   npx tsx tools/optimize.ts --data=snapshot --config=optimizer.config.json --out=output
 */

import * as fs from 'fs';
import * as path from 'path';
import { describeVariant } from '../src/models/Track';
import { snapshotLoaderService } from '../src/services/SnapshotLoaderService';
import { loadOptimizerConfig, runOptimizer } from '../src/services/OptimizerRunService';
import { reportService } from '../src/services/ReportService';
import { formatTime } from '../src/utils/timeFormat';

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) continue;
    const [k, ...rest] = arg.slice(2).split('=');
    out[k] = rest.join('=');
  }
  return out;
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));
  const config = loadOptimizerConfig(args['config'] || 'optimizer.config.json');

  const username = args['user'] || config.username;
  if (!username) {
    throw new Error('No username given (use --user=NAME or "username" in the config file)');
  }
  const dataDir = args['data'] || 'snapshot';
  const outputDir = args['out'] || config.outputDir || 'output';

  console.log(`Loading snapshot from ${dataDir}...`);
  const { standings, leaderboards, ranking } = snapshotLoaderService.loadSnapshot(dataDir);
  const naCount = standings.filter(s => s.isNa).length;
  console.log(`  Track times: ${standings.length - naCount} submitted, ${naCount} N/A`);
  console.log(`  Leaderboards: ${leaderboards.size}, ranking entries: ${ranking.length}`);

  const result = runOptimizer({
    username,
    standings,
    leaderboards,
    ranking,
    config,
    log: message => console.log(`  ${message}`),
    warn: message => console.warn(`  ⚠️  ${message}`),
  });

  fs.mkdirSync(outputDir, { recursive: true });
  const jsonPath = path.join(outputDir, 'report.json');
  const csvPath = path.join(outputDir, 'opportunities.csv');
  fs.writeFileSync(jsonPath, JSON.stringify(result.report, null, 2));
  fs.writeFileSync(csvPath, reportService.opportunitiesToCsv(result.opportunities));

  const naOpps = result.opportunities.filter(o => o.isNa);
  const rankedOpps = result.opportunities.filter(o => !o.isNa && o.tiers.length > 0);

  console.log(`\n${'='.repeat(60)}`);
  console.log(`  Player:         ${username}`);
  console.log(`  Combined Rank:  #${result.currentRank}`);
  console.log(`  Average Finish: ${result.currentAf}`);
  console.log(`  N/A tracks:     ${naOpps.length}`);
  console.log(`  Improvable:     ${rankedOpps.length} tracks`);
  console.log(`${'='.repeat(60)}`);

  if (naOpps.length > 0) {
    console.log('\n  Top priority - submit times for:');
    naOpps.slice(0, 5).forEach(o => console.log(`    - ${describeVariant(o.track)}`));
  }

  if (rankedOpps.length > 0) {
    console.log('\n  Best efficiency improvements:');
    for (const o of rankedOpps.slice(0, 5)) {
      const t = o.tiers[o.bestTierIdx];
      console.log(
        `    - ${describeVariant(o.track)}: rank ${o.currentRank} -> ${t.targetRank}, ` +
        `need ${formatTime(t.timeDeltaCs)} faster, AF -${t.afImprovement.toFixed(4)}`
      );
    }
  }

  const { overtakeMinTime, overtakeMinTracks, target } = result;
  if (target && overtakeMinTime && overtakeMinTracks) {
    console.log(`\n  Overtaking #${target.rank} ${target.username} (AF ${target.af}):`);
    if (overtakeMinTime.feasible) {
      console.log(`    Min time:   ${overtakeMinTime.items.length} tracks, ${formatTime(overtakeMinTime.totalTimeInvestmentCs)} total improvement`);
      console.log(`    Min tracks: ${overtakeMinTracks.items.length} tracks, ${formatTime(overtakeMinTracks.totalTimeInvestmentCs)} total improvement`);
    } else {
      console.log('    Not enough improvement available to overtake.');
    }
  }

  console.log(`\n  JSON report: ${path.resolve(jsonPath)}`);
  console.log(`  CSV export:  ${path.resolve(csvPath)}`);
}

try {
  main();
} catch (err) {
  console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
