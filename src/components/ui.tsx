import React from 'react';
import type { LucideIcon } from 'lucide-react';
import { AlertTriangle } from 'lucide-react';
import { motion } from 'motion/react';
import { fieldLabel } from '../config';
import type { FieldSpec } from '../types';
import { cn } from '../utils';

export const StatCard = ({ title, value, unit, icon: Icon, color }: { title: string, value: string | number, unit?: string, icon: LucideIcon, color: string }) => (
  <div className="bg-zinc-900 border border-zinc-800 p-4 rounded-xl">
    <div className="flex items-center gap-3 mb-2">
      <div className={cn("p-2 rounded-lg bg-opacity-10", color.replace('text-', 'bg-'))}>
        <Icon className={cn("w-4 h-4", color)} />
      </div>
      <span className="text-zinc-500 text-xs font-medium uppercase tracking-wider">{title}</span>
    </div>
    <div className="flex items-baseline gap-1">
      <span className="text-2xl font-mono font-bold text-white">{value}</span>
      {unit && <span className="text-zinc-500 text-sm">{unit}</span>}
    </div>
  </div>
);

export const InputGroup = ({ label, htmlFor, children }: { label: string, htmlFor?: string, children: React.ReactNode }) => (
  <div className="space-y-2">
    <label htmlFor={htmlFor} className="text-[10px] font-bold text-zinc-500 uppercase tracking-widest block">{label}</label>
    {children}
  </div>
);

export const NumberField = ({ id, field, value, onChange }: { id: string, field: FieldSpec, value: number, onChange: (value: number) => void }) => (
  <InputGroup label={fieldLabel(field)} htmlFor={id}>
    <input
      id={id}
      type="number"
      min={field.min}
      max={field.max}
      step={field.step}
      value={Number.isNaN(value) ? '' : value}
      // an emptied field reads as NaN so the calculator reports it
      onChange={(e) => onChange(e.target.value === '' ? NaN : Number(e.target.value))}
      className="w-full bg-zinc-800/50 border border-zinc-700 rounded-lg px-3 py-2 text-sm font-mono text-white focus:outline-none focus:border-emerald-500/50"
    />
  </InputGroup>
);

export const BlockError = ({ message }: { message: string }) => (
  <motion.div
    role="alert"
    initial={{ opacity: 0, y: 8 }}
    animate={{ opacity: 1, y: 0 }}
    className="bg-red-500/10 border border-red-500/50 rounded-xl p-4 flex items-center gap-4"
  >
    <div className="p-2 bg-red-500 rounded-lg">
      <AlertTriangle className="w-4 h-4 text-black" />
    </div>
    <p className="text-xs text-red-500">{message}</p>
  </motion.div>
);

export const BlockCard = ({ index, title, subtitle, children }: { index: number, title: string, subtitle: string, children: React.ReactNode }) => (
  <section className="bg-zinc-900 border border-zinc-800 rounded-2xl p-6 space-y-6">
    <div>
      <h2 className="text-white font-bold">{index}) {title}</h2>
      <p className="text-xs text-zinc-500">{subtitle}</p>
    </div>
    {children}
  </section>
);
