/**
 * League Ticker Service - Preview Entry Point
 *
 * Builds the application from the environment and prints one composed
 * view as JSON. Useful for checking upstream data and configuration
 * without a presentation layer.
 *
 * @example
 * npm run dev -- --datasets upcoming,recent,standings --team MIN --upcoming 3
 */

import { parseArgs } from 'node:util';
import { cfg } from './core/config.js';
import { logger } from './core/logger.js';
import { createApp } from './services/app.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      datasets: { type: 'string', default: 'upcoming,recent,standings' },
      team: { type: 'string' },
      division: { type: 'string' },
      upcoming: { type: 'string' },
      recent: { type: 'string' },
      'no-standings': { type: 'boolean', default: false },
      theme: { type: 'string' }
    }
  });

  const app = createApp(cfg);
  const view = await app.views.getView({
    datasets: (values.datasets ?? '').split(',').map(s => s.trim()).filter(Boolean),
    counts: { upcoming: values.upcoming, recent: values.recent },
    division: values.division,
    includeStandings: !values['no-standings'],
    team: values.team,
    theme: values.theme
  });

  process.stdout.write(`${JSON.stringify(view, null, 2)}\n`);
}

main().catch((err) => {
  logger.error({ err }, 'Fatal error occurred');
  process.exitCode = 1;
});
