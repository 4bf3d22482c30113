import React, { useState } from 'react';
import { Cpu, Sigma, Zap } from 'lucide-react';
import { AnimatePresence, motion } from 'motion/react';
import { CapacitanceBlock } from './components/CapacitanceBlock';
import { ChargeDensityBlock } from './components/ChargeDensityBlock';
import { DischargeTimeBlock } from './components/DischargeTimeBlock';
import { DEFAULT_DIELECTRIC, FIELDS } from './config';
import type { CapacitanceInputs, ChargeDensityInputs, DischargeInputs } from './types';

// --- Defaults ---

const initialCapacitance: CapacitanceInputs = {
  areaCm2: FIELDS.areaCm2.defaultValue,
  gapMm: FIELDS.gapMm.defaultValue,
  dielectric: DEFAULT_DIELECTRIC,
  customEpsilonR: FIELDS.customEpsilonR.defaultValue,
};

const initialDensity: ChargeDensityInputs = {
  capacitancePf: FIELDS.densityCapacitancePf.defaultValue,
  voltageV: FIELDS.voltageV.defaultValue,
  volumeMl: FIELDS.volumeMl.defaultValue,
};

const initialDischarge: DischargeInputs = {
  resistanceMOhm: FIELDS.resistanceMOhm.defaultValue,
  capacitancePf: FIELDS.rcCapacitancePf.defaultValue,
  remainingPct: FIELDS.remainingPct.defaultValue,
};

export default function App() {
  const [capacitance, setCapacitance] = useState<CapacitanceInputs>(initialCapacitance);
  const [density, setDensity] = useState<ChargeDensityInputs>(initialDensity);
  const [discharge, setDischarge] = useState<DischargeInputs>(initialDischarge);
  const [notice, setNotice] = useState<string | null>(null);

  // A hand-off overwrites the target field once; later edits on either side stay independent.
  const copyToDensity = (capacitancePf: number) => {
    setDensity(s => ({ ...s, capacitancePf }));
    setNotice(`Copied ${capacitancePf.toFixed(2)} pF into charge density`);
  };

  const copyToDischarge = (capacitancePf: number) => {
    setDischarge(s => ({ ...s, capacitancePf }));
    setNotice(`Copied ${capacitancePf.toFixed(2)} pF into RC time`);
  };

  return (
    <div className="min-h-screen bg-[#050505] text-zinc-300 font-sans selection:bg-emerald-500/30">
      {/* Header */}
      <header className="border-b border-zinc-800 bg-zinc-900/50 backdrop-blur-md sticky top-0 z-50">
        <div className="max-w-5xl mx-auto px-6 h-16 flex items-center justify-between">
          <div className="flex items-center gap-3">
            <div className="w-8 h-8 bg-emerald-500 rounded-lg flex items-center justify-center">
              <Zap className="w-5 h-5 text-black fill-current" />
            </div>
            <div>
              <h1 className="text-white font-bold tracking-tight leading-none">Plate Lab</h1>
              <p className="text-[10px] text-zinc-500 uppercase tracking-[0.2em] font-bold mt-1">Electrostatics Calculators</p>
            </div>
          </div>
          <div className="hidden md:flex items-center gap-4 text-xs font-medium text-zinc-500">
            <span className="flex items-center gap-1.5"><Sigma className="w-3 h-3" /> Closed-form</span>
            <span className="flex items-center gap-1.5"><Cpu className="w-3 h-3" /> Units: cm², mm, pF, mL, MΩ</span>
          </div>
        </div>
      </header>

      <main className="max-w-5xl mx-auto p-6 space-y-6">
        <AnimatePresence>
          {notice && (
            <motion.div
              role="status"
              initial={{ opacity: 0, y: -10 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0 }}
              className="bg-emerald-500/5 border border-emerald-500/20 rounded-xl px-4 py-3 flex items-center justify-between text-xs text-emerald-500"
            >
              <span>{notice}</span>
              <button type="button" onClick={() => setNotice(null)} className="font-bold uppercase tracking-wider hover:text-emerald-400">
                Dismiss
              </button>
            </motion.div>
          )}
        </AnimatePresence>

        <CapacitanceBlock
          inputs={capacitance}
          onChange={setCapacitance}
          onUseInDensity={copyToDensity}
          onUseInDischarge={copyToDischarge}
        />
        <ChargeDensityBlock inputs={density} onChange={setDensity} />
        <DischargeTimeBlock inputs={discharge} onChange={setDischarge} />

        {/* Footer */}
        <div className="flex flex-col md:flex-row items-center justify-between pt-6 border-t border-zinc-800 text-[10px] font-bold text-zinc-600 uppercase tracking-[0.2em]">
          <span>Ideal parallel plates, no fringing</span>
          <span>Charge density in µC/L</span>
        </div>
      </main>
    </div>
  );
}
