import React, { useMemo } from 'react';
import { Activity, Timer } from 'lucide-react';
import {
  Area,
  AreaChart,
  CartesianGrid,
  ReferenceLine,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import { dischargeCurve, dischargeTime, timeConstant } from '../calculations';
import { FIELDS } from '../config';
import { UNIT } from '../constants';
import { evaluate } from '../evaluate';
import { formatMilliseconds, formatPercent, formatSeconds } from '../format';
import type { DischargeInputs, DischargePoint } from '../types';
import { BlockCard, BlockError, NumberField, StatCard } from './ui';

interface DischargeSummary {
  seconds: number;
  tau: number;
  curve: DischargePoint[];
}

export function DischargeTimeBlock({ inputs, onChange }: { inputs: DischargeInputs, onChange: (inputs: DischargeInputs) => void }) {
  const { resistanceMOhm, capacitancePf, remainingPct } = inputs;
  const result = useMemo(
    () => evaluate<DischargeSummary>('RC time', () => ({
      seconds: dischargeTime(resistanceMOhm, capacitancePf, remainingPct / 100),
      tau: timeConstant(resistanceMOhm, capacitancePf),
      curve: dischargeCurve(resistanceMOhm, capacitancePf),
    })),
    [resistanceMOhm, capacitancePf, remainingPct],
  );

  return (
    <BlockCard index={3} title="RC discharge time" subtitle="t = −R · C · ln(remaining fraction)">
      <div className="grid grid-cols-1 md:grid-cols-3 gap-4">
        <NumberField id="rc-resistance" field={FIELDS.resistanceMOhm} value={resistanceMOhm} onChange={(value) => onChange({ ...inputs, resistanceMOhm: value })} />
        <NumberField id="rc-capacitance" field={FIELDS.rcCapacitancePf} value={capacitancePf} onChange={(value) => onChange({ ...inputs, capacitancePf: value })} />
        <NumberField id="rc-remaining" field={FIELDS.remainingPct} value={remainingPct} onChange={(value) => onChange({ ...inputs, remainingPct: value })} />
      </div>

      {result.ok ? (
        <div className="space-y-4">
          <p className="text-sm text-zinc-300">
            Time to reach {formatPercent(remainingPct)} remaining: <span className="font-mono text-white">{formatSeconds(result.value.seconds)}</span>
          </p>
          <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
            <StatCard title="Discharge time" value={formatMilliseconds(result.value.seconds)} icon={Timer} color="text-yellow-500" />
            <StatCard title="Time constant τ" value={formatMilliseconds(result.value.tau)} icon={Activity} color="text-blue-500" />
          </div>
          {result.value.curve.length > 0 && (
            <DecayChart curve={result.value.curve} targetMs={result.value.seconds * UNIT.S_TO_MS} remainingPct={remainingPct} />
          )}
        </div>
      ) : (
        <BlockError message={result.message} />
      )}
    </BlockCard>
  );
}

const DecayChart = ({ curve, targetMs, remainingPct }: { curve: DischargePoint[], targetMs: number, remainingPct: number }) => (
  <div className="h-[220px] w-full">
    <ResponsiveContainer width="100%" height="100%">
      <AreaChart data={curve}>
        <defs>
          <linearGradient id="colorRemaining" x1="0" y1="0" x2="0" y2="1">
            <stop offset="5%" stopColor="#10b981" stopOpacity={0.3}/>
            <stop offset="95%" stopColor="#10b981" stopOpacity={0}/>
          </linearGradient>
        </defs>
        <CartesianGrid strokeDasharray="3 3" stroke="#18181b" vertical={false} />
        <XAxis
          dataKey="timeMs"
          type="number"
          stroke="#52525b"
          fontSize={10}
          tickLine={false}
          axisLine={false}
          tickFormatter={(v: number) => v.toFixed(1)}
          label={{ value: 'Time (ms)', position: 'insideBottom', offset: -5, fontSize: 10, fill: '#52525b' }}
        />
        <YAxis stroke="#52525b" fontSize={10} tickLine={false} axisLine={false} domain={[0, 100]} unit="%" />
        <Tooltip
          contentStyle={{ backgroundColor: '#18181b', border: '1px solid #27272a', borderRadius: '8px', fontSize: '12px' }}
          itemStyle={{ color: '#10b981' }}
          formatter={(v) => formatPercent(Number(v))}
          labelFormatter={(v) => `${Number(v).toFixed(3)} ms`}
        />
        <ReferenceLine x={targetMs} stroke="#f59e0b" strokeDasharray="4 4" />
        <ReferenceLine y={remainingPct} stroke="#f59e0b" strokeDasharray="4 4" />
        <Area type="monotone" dataKey="remainingPct" name="Remaining" stroke="#10b981" strokeWidth={2} fillOpacity={1} fill="url(#colorRemaining)" />
      </AreaChart>
    </ResponsiveContainer>
  </div>
);
