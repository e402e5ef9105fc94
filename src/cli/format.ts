import { ACTIONS } from '../shared/types.js';
import type { DecisionResult } from '../shared/types.js';

const AGENT_COL = 14;
const SCORE_COL = 7;

function dollars(value: number): string {
  return `$${value.toFixed(2)}`;
}

function row(label: string, cells: Array<string | number>): string {
  return label.padEnd(AGENT_COL) + cells.map((c) => String(c).padStart(SCORE_COL)).join('');
}

/** Plain-text rendering of a decision: finance, ballot table, runoff, winner. */
export function formatDecision(result: DecisionResult): string[] {
  const { snapshot, tally, history } = result;
  const lines: string[] = [];

  lines.push(
    `Finance: gross ${dollars(snapshot.gross)} | gas ${dollars(snapshot.gasCost)} | maint ${dollars(snapshot.maintenanceCost)}`
      + ` | net ${dollars(snapshot.net)} | target ${dollars(snapshot.target)} | gap ${dollars(snapshot.gap)} (${(snapshot.gapRatio * 100).toFixed(1)}%)`,
  );
  lines.push(`Urgency: ${result.urgency.toFixed(1)} / 100`);
  lines.push(`Recent: hours_yesterday=${history.hoursYesterday.toFixed(1)} | avg_net_per_hr=${dollars(history.avgNetPerHourRecent)}`);

  if (result.economics) {
    lines.push('Options:');
    for (const action of ACTIONS) {
      const o = result.economics[action];
      lines.push(
        `  ${action}: hours=${o.hours}, gross=${dollars(o.gross)}, gas=${dollars(o.gasCost)}, maint=${dollars(o.maintenanceCost)}, net=${dollars(o.net)}`,
      );
    }
  }

  lines.push(row('agent', [...ACTIONS]));
  for (const entry of result.ballot.entries) {
    lines.push(row(entry.agent, ACTIONS.map((a) => entry.vote[a])));
  }
  lines.push(row('TOTAL', ACTIONS.map((a) => tally.totals[a])));

  const [first, second] = tally.topTwo;
  lines.push(`Runoff: ${first} ${tally.preferences[0]} vs ${second} ${tally.preferences[1]}`);
  if (tally.nudgeApplied) {
    lines.push(`Near-tie nudge: ${tally.runoffWinner} -> ${tally.winner}`);
  }
  lines.push(`Winner: ${result.winner} (${result.plannedHours}h)`);

  return lines;
}
