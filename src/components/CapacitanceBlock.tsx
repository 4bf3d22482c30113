import React, { useMemo } from 'react';
import { ArrowRight, Layers } from 'lucide-react';
import { calculateCapacitance } from '../calculations';
import { DIELECTRIC_PRESETS, FIELDS, resolveEpsilonR } from '../config';
import { evaluate } from '../evaluate';
import { faradsToPicofarads, formatCapacitance } from '../format';
import type { CapacitanceInputs } from '../types';
import { cn } from '../utils';
import { BlockCard, BlockError, InputGroup, NumberField, StatCard } from './ui';

interface Props {
  inputs: CapacitanceInputs;
  onChange: (inputs: CapacitanceInputs) => void;
  onUseInDensity: (capacitancePf: number) => void;
  onUseInDischarge: (capacitancePf: number) => void;
}

export function CapacitanceBlock({ inputs, onChange, onUseInDensity, onUseInDischarge }: Props) {
  const epsilonR = resolveEpsilonR(inputs.dielectric, inputs.customEpsilonR);
  const result = useMemo(
    () => evaluate('Capacitance', () => calculateCapacitance(inputs.areaCm2, inputs.gapMm, epsilonR)),
    [inputs.areaCm2, inputs.gapMm, epsilonR],
  );

  return (
    <BlockCard index={1} title="Capacitance (parallel-plate)" subtitle="C = ε0 · εr · A / d">
      <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
        <NumberField id="cap-area" field={FIELDS.areaCm2} value={inputs.areaCm2} onChange={(areaCm2) => onChange({ ...inputs, areaCm2 })} />
        <NumberField id="cap-gap" field={FIELDS.gapMm} value={inputs.gapMm} onChange={(gapMm) => onChange({ ...inputs, gapMm })} />
      </div>

      <InputGroup label="Dielectric">
        <div className="grid grid-cols-3 gap-2">
          {DIELECTRIC_PRESETS.map((preset) => (
            <button
              key={preset.id}
              type="button"
              aria-pressed={inputs.dielectric === preset.id}
              onClick={() => onChange({ ...inputs, dielectric: preset.id })}
              className={cn(
                "text-[10px] font-bold py-2 px-1 rounded-lg border transition-all",
                inputs.dielectric === preset.id
                  ? "bg-emerald-500/10 border-emerald-500/50 text-emerald-500"
                  : "bg-zinc-800/50 border-zinc-700 text-zinc-500 hover:border-zinc-600"
              )}
            >
              {preset.label}
            </button>
          ))}
        </div>
      </InputGroup>

      {inputs.dielectric === 'custom' && (
        <NumberField
          id="cap-epsilon-r"
          field={FIELDS.customEpsilonR}
          value={inputs.customEpsilonR}
          onChange={(customEpsilonR) => onChange({ ...inputs, customEpsilonR })}
        />
      )}

      {result.ok ? (
        <CapacitanceResult
          farads={result.value}
          onUseInDensity={onUseInDensity}
          onUseInDischarge={onUseInDischarge}
        />
      ) : (
        <BlockError message={result.message} />
      )}
    </BlockCard>
  );
}

function CapacitanceResult({ farads, onUseInDensity, onUseInDischarge }: { farads: number } & Pick<Props, 'onUseInDensity' | 'onUseInDischarge'>) {
  const display = formatCapacitance(farads);
  const picofarads = faradsToPicofarads(farads);

  return (
    <div className="space-y-4">
      <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
        <StatCard title="Capacitance" value={display.farads} icon={Layers} color="text-emerald-500" />
        <StatCard title="Picofarads" value={display.picofarads} icon={Layers} color="text-blue-500" />
        <StatCard title="Nanofarads" value={display.nanofarads} icon={Layers} color="text-cyan-500" />
      </div>
      <div className="flex flex-wrap gap-2">
        <button
          type="button"
          onClick={() => onUseInDensity(picofarads)}
          className="flex items-center gap-2 bg-emerald-500 hover:bg-emerald-400 text-black px-4 py-2 rounded-full text-xs font-bold transition-all"
        >
          Use in charge density <ArrowRight className="w-3 h-3" />
        </button>
        <button
          type="button"
          onClick={() => onUseInDischarge(picofarads)}
          className="flex items-center gap-2 bg-emerald-500 hover:bg-emerald-400 text-black px-4 py-2 rounded-full text-xs font-bold transition-all"
        >
          Use in RC time <ArrowRight className="w-3 h-3" />
        </button>
      </div>
    </div>
  );
}
