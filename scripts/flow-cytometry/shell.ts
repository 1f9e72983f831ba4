import { CHANNELS } from '../../shared/types/cytometry';
import { CytometryError } from '../../server/cytometry/errors';
import type { FlowCytometrySimulator } from '../../server/cytometry/simulator';
import { summarizeChannel } from '../../server/cytometry/stats';
import { renderOverview } from '../../server/cytometry/visualization';
import { formatPercent, type Ask, type Print } from './io';
import { editParameters } from './parameters';

export const ACTIONS = ['simulate', 'visualize', 'parameters', 'quit'] as const;

export type ShellAction = typeof ACTIONS[number];

function isAction(value: string): value is ShellAction {
  return ACTIONS.some((action) => action === value);
}

async function runSimulate(simulator: FlowCytometrySimulator, ask: Ask, print: Print): Promise<void> {
  const answer = (await ask(`Number of cells (${simulator.config.totalCells}): `)).trim();
  const total = answer === '' ? simulator.config.totalCells : Number(answer);

  const { data, distribution } = simulator.simulate(total);
  print(`Generated ${data.population.length} cells with distribution:`);
  for (const share of distribution) {
    print(`  ${share.name}: ${share.count} (${formatPercent(share.fraction)})`);
  }

  print('Channel summary (after spillover):');
  for (const channel of CHANNELS) {
    const { mean, std, min, max } = summarizeChannel(data, channel);
    print(`  ${channel}: mean=${mean.toFixed(2)}, sd=${std.toFixed(2)}, range=[${min.toFixed(2)}, ${max.toFixed(2)}]`);
  }
}

async function runVisualize(simulator: FlowCytometrySimulator, ask: Ask, print: Print): Promise<void> {
  const { data } = simulator.requireData();
  const logChoice = (await ask('Use logarithmic scale? [y/n] ')).trim().toLowerCase();
  print(renderOverview(data, { logScale: logChoice === 'y' }));
}

/**
 * Prompt loop over simulate/visualize/parameters/quit. Domain errors are
 * reported and the loop continues; anything else propagates.
 */
export async function runShell(simulator: FlowCytometrySimulator, ask: Ask, print: Print): Promise<void> {
  while (true) {
    const action = (await ask(`\nChoose action: [${ACTIONS.join('/')}] `)).trim().toLowerCase();

    if (!isAction(action)) {
      print(`Invalid option. Please choose ${ACTIONS.join('/')}`);
      continue;
    }
    if (action === 'quit') break;

    try {
      if (action === 'simulate') {
        await runSimulate(simulator, ask, print);
      } else if (action === 'visualize') {
        await runVisualize(simulator, ask, print);
      } else {
        await editParameters(simulator, ask, print);
      }
    } catch (error) {
      if (!(error instanceof CytometryError)) throw error;
      print(`Error: ${error.message}`);
    }
  }
}
