/**
 * Example: plan a shared 3D printer queue
 *
 * This example demonstrates:
 * - Priority classes (1 = thesis work, 2 = lab work, 3 = personal projects)
 * - Volume and item limits per print batch
 * - Oversized jobs printed alone instead of rejected
 * - Tracking batches with events
 */

import {
  BatchPlanner,
  PlannerEvent,
  Constraints,
  Job,
  formatMinutes,
} from '../src/index';

interface Scenario {
  title: string;
  jobs: Job[];
}

const constraints: Constraints = { maxVolume: 300, maxItems: 2 };

const scenarios: Scenario[] = [
  {
    title: 'Models with the same priority',
    jobs: [
      { id: 'M1', volume: 100, priority: 1, printTime: 120 },
      { id: 'M2', volume: 150, priority: 1, printTime: 90 },
      { id: 'M3', volume: 120, priority: 1, printTime: 150 },
    ],
  },
  {
    title: 'Models with different priorities',
    jobs: [
      { id: 'M1', volume: 100, priority: 2, printTime: 120 },
      { id: 'M2', volume: 150, priority: 1, printTime: 90 },
      { id: 'M3', volume: 120, priority: 3, printTime: 150 },
    ],
  },
  {
    title: 'Volume limit exceeded',
    jobs: [
      { id: 'M1', volume: 250, priority: 1, printTime: 180 },
      { id: 'M2', volume: 200, priority: 1, printTime: 150 },
      { id: 'M3', volume: 180, priority: 2, printTime: 120 },
    ],
  },
  {
    title: 'Everything fits in one batch',
    jobs: [
      { id: 'M1', volume: 80, priority: 1, printTime: 60 },
      { id: 'M2', volume: 70, priority: 1, printTime: 50 },
    ],
  },
  {
    title: 'Item limit exceeded',
    jobs: [
      { id: 'M1', volume: 50, priority: 1, printTime: 60 },
      { id: 'M2', volume: 50, priority: 1, printTime: 70 },
      { id: 'M3', volume: 50, priority: 1, printTime: 80 },
    ],
  },
];

function main(): void {
  const planner = new BatchPlanner();

  planner.on(PlannerEvent.BATCH_CLOSED, ({ batch }) => {
    const ids = batch.jobs.map(job => job.id).join(' + ');
    console.log(
      `  Batch ${batch.index + 1}: ${ids} (volume ${batch.accumulatedVolume}/${constraints.maxVolume}, ` +
      `${formatMinutes(batch.representativeTime)})`
    );
  });

  for (const scenario of scenarios) {
    console.log(`\n=== ${scenario.title} ===`);
    const result = planner.plan({ jobs: scenario.jobs, constraints });
    console.log(`  Print order: ${result.printOrder.join(', ')}`);
    console.log(`  Total time: ${result.totalTime} minutes (${formatMinutes(result.totalTime)})`);
  }
}

main();
