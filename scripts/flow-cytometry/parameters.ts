import type { PopulationField, PopulationSpec } from '../../shared/types/cytometry';
import { ValidationError } from '../../server/cytometry/errors';
import type { FlowCytometrySimulator } from '../../server/cytometry/simulator';
import { formatNumber, type Ask, type Print } from './io';

export const EDITABLE_FIELDS: ReadonlyArray<{ field: PopulationField; label: string }> = [
  { field: 'fscMean', label: 'size (FSC) mean' },
  { field: 'fscStd', label: 'size (FSC) sd' },
  { field: 'sscMean', label: 'complexity (SSC) mean' },
  { field: 'sscStd', label: 'complexity (SSC) sd' },
  { field: 'fl1Mean', label: 'FL1 mean' },
  { field: 'fl1Std', label: 'FL1 sd' },
  { field: 'fl2Mean', label: 'FL2 mean' },
  { field: 'fl2Std', label: 'FL2 sd' },
  { field: 'proportion', label: 'proportion' },
  { field: 'doublePositiveFraction', label: 'double-positive fraction' },
];

export function describePopulation(spec: PopulationSpec): string[] {
  return [
    `  size (FSC): mean=${formatNumber(spec.fscMean)}, sd=${formatNumber(spec.fscStd)}`,
    `  complexity (SSC): mean=${formatNumber(spec.sscMean)}, sd=${formatNumber(spec.sscStd)}`,
    `  FL1: mean=${formatNumber(spec.fl1Mean)}, sd=${formatNumber(spec.fl1Std)}`,
    `  FL2: mean=${formatNumber(spec.fl2Mean)}, sd=${formatNumber(spec.fl2Std)}`,
    `  proportion: ${formatNumber(spec.proportion)}`,
    `  double-positive fraction: ${formatNumber(spec.doublePositiveFraction)}`,
  ];
}

/**
 * Interactive edit of one population. Each field goes through the registry's
 * validated update; a rejected value is reported and the old one kept.
 */
export async function editParameters(
  simulator: FlowCytometrySimulator,
  ask: Ask,
  print: Print,
): Promise<void> {
  const { registry } = simulator;
  print(`Available populations: ${registry.names().join(', ')}`);

  const name = (await ask('Select population to modify: ')).trim();
  if (!registry.has(name)) {
    print('Invalid population!');
    return;
  }

  print(`Current parameters for ${name}:`);
  describePopulation(registry.get(name)).forEach((line) => print(line));

  print('\nEnter new values (leave blank to keep current):');
  let proportionChanged = false;
  let rejected = 0;

  for (const { field, label } of EDITABLE_FIELDS) {
    const current = registry.get(name)[field];
    const answer = await ask(`New ${label} (${formatNumber(current)}): `);
    if (answer.trim() === '') continue;

    try {
      registry.update(name, field, Number(answer.trim()));
      if (field === 'proportion') proportionChanged = true;
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      rejected++;
      print(`   ${error.message} (keeping ${formatNumber(current)})`);
    }
  }

  if (proportionChanged && registry.size > 1) {
    const choice = (await ask('Rebalance other populations so proportions sum to 1? [y/n] ')).trim().toLowerCase();
    if (choice === 'y') {
      try {
        registry.rebalance(name);
        print('   Other populations rescaled');
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        print(`   ${error.message}`);
      }
    }
  }

  print(rejected > 0 ? `Parameters updated (${rejected} value(s) rejected)` : 'Parameters updated!');
  print(`Proportion total: ${formatNumber(registry.proportionTotal())}`);
}
