import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { loadSimulatorConfig } from '../../server/cytometry/config';
import { FlowCytometrySimulator } from '../../server/cytometry/simulator';
import { runShell } from './shell';

function readFlag(args: string[], name: string): string | undefined {
  return args.find(a => a.startsWith(`--${name}=`))?.split('=')[1];
}

async function main() {
  const args = process.argv.slice(2);

  const config = loadSimulatorConfig({
    ...process.env,
    FLOW_SIM_SEED: readFlag(args, 'seed') ?? process.env.FLOW_SIM_SEED,
    FLOW_SIM_TOTAL_CELLS: readFlag(args, 'count') ?? process.env.FLOW_SIM_TOTAL_CELLS,
    FLOW_SIM_ALLOCATION: readFlag(args, 'allocation') ?? process.env.FLOW_SIM_ALLOCATION,
  });

  console.log('Flow Cytometry Simulator');
  console.log(`   Populations: ${config.populations.map(p => p.name).join(', ')}`);
  console.log(`   Cells per run: ${config.totalCells}`);
  console.log(`   Seed: ${config.seed ?? 'random'}`);

  const simulator = new FlowCytometrySimulator(config);
  const rl = createInterface({ input: stdin, output: stdout });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  try {
    await runShell(
      simulator,
      async (question) => (closed ? 'quit' : rl.question(question)),
      (line) => console.log(line),
    );
  } finally {
    rl.close();
  }
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
