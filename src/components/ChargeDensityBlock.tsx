import React, { useMemo } from 'react';
import { Droplets } from 'lucide-react';
import { chargeDensity } from '../calculations';
import { FIELDS } from '../config';
import { evaluate } from '../evaluate';
import { formatChargeDensity } from '../format';
import type { ChargeDensityInputs } from '../types';
import { BlockCard, BlockError, NumberField, StatCard } from './ui';

export function ChargeDensityBlock({ inputs, onChange }: { inputs: ChargeDensityInputs, onChange: (inputs: ChargeDensityInputs) => void }) {
  const result = useMemo(
    () => evaluate('Charge density', () => chargeDensity(inputs.capacitancePf, inputs.voltageV, inputs.volumeMl)),
    [inputs.capacitancePf, inputs.voltageV, inputs.volumeMl],
  );

  return (
    <BlockCard index={2} title="Charge density" subtitle="Q = C · V, spread over the negative plate volume">
      <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
        <NumberField id="dens-capacitance" field={FIELDS.densityCapacitancePf} value={inputs.capacitancePf} onChange={(capacitancePf) => onChange({ ...inputs, capacitancePf })} />
        <NumberField id="dens-voltage" field={FIELDS.voltageV} value={inputs.voltageV} onChange={(voltageV) => onChange({ ...inputs, voltageV })} />
        <NumberField id="dens-volume" field={FIELDS.volumeMl} value={inputs.volumeMl} onChange={(volumeMl) => onChange({ ...inputs, volumeMl })} />
      </div>

      {result.ok ? (
        <StatCard
          title="Charge density"
          value={formatChargeDensity(result.value)}
          icon={Droplets}
          color={result.value < 0 ? "text-orange-500" : "text-emerald-500"}
        />
      ) : (
        <BlockError message={result.message} />
      )}
    </BlockCard>
  );
}
