"use client";

import React from "react";
import { DISTANCE_RANGE, HORIZON_RANGE, usePaybackStore } from "../store/paybackStore";

/**
 * Sidebar: vehicle pickers, usage sliders and the run button
 */
export default function SimulationControls() {
  const database = usePaybackStore((s) => s.database);
  const selectedCombustion = usePaybackStore((s) => s.selectedCombustion);
  const selectedElectric = usePaybackStore((s) => s.selectedElectric);
  const annualDistanceKm = usePaybackStore((s) => s.annualDistanceKm);
  const horizonYears = usePaybackStore((s) => s.horizonYears);
  const incentiveApplied = usePaybackStore((s) => s.incentiveApplied);
  const mode = usePaybackStore((s) => s.mode);

  const selectCombustion = usePaybackStore((s) => s.selectCombustion);
  const selectElectric = usePaybackStore((s) => s.selectElectric);
  const setAnnualDistance = usePaybackStore((s) => s.setAnnualDistance);
  const setHorizonYears = usePaybackStore((s) => s.setHorizonYears);
  const setIncentiveApplied = usePaybackStore((s) => s.setIncentiveApplied);
  const setMode = usePaybackStore((s) => s.setMode);
  const runSimulation = usePaybackStore((s) => s.runSimulation);

  if (!database) return null;

  return (
    <aside className="w-full md:w-80 flex-shrink-0 space-y-6 p-4 bg-slate-900 rounded-lg border border-slate-700">
      <section className="space-y-3">
        <h2 className="text-sm font-semibold text-slate-300 uppercase tracking-wide">1. Vehicles to compare</h2>
        <label className="block text-xs text-slate-400">
          Gasoline vehicle
          <select
            className="mt-1 w-full bg-slate-800 border border-slate-600 rounded px-2 py-1 text-sm text-white"
            value={selectedCombustion ?? ""}
            onChange={(e) => selectCombustion(e.target.value)}
          >
            {database.catalog.combustion.map((v) => (
              <option key={v.name} value={v.name}>
                {v.name}
              </option>
            ))}
          </select>
        </label>
        <label className="block text-xs text-slate-400">
          Electric vehicle
          <select
            className="mt-1 w-full bg-slate-800 border border-slate-600 rounded px-2 py-1 text-sm text-white"
            value={selectedElectric ?? ""}
            onChange={(e) => selectElectric(e.target.value)}
          >
            {database.catalog.electric.map((v) => (
              <option key={v.name} value={v.name}>
                {v.name}
              </option>
            ))}
          </select>
        </label>
      </section>

      <section className="space-y-3">
        <h2 className="text-sm font-semibold text-slate-300 uppercase tracking-wide">2. Usage</h2>
        <label className="block text-xs text-slate-400">
          Kilometres per year: <span className="text-white font-mono">{annualDistanceKm.toLocaleString("en-US")}</span>
          <input
            type="range"
            className="w-full"
            min={DISTANCE_RANGE.min}
            max={DISTANCE_RANGE.max}
            step={DISTANCE_RANGE.step}
            value={annualDistanceKm}
            onChange={(e) => setAnnualDistance(Number(e.target.value))}
          />
        </label>
        <label className="block text-xs text-slate-400">
          Analysis horizon (years): <span className="text-white font-mono">{horizonYears}</span>
          <input
            type="range"
            className="w-full"
            min={HORIZON_RANGE.min}
            max={HORIZON_RANGE.max}
            step={HORIZON_RANGE.step}
            value={horizonYears}
            onChange={(e) => setHorizonYears(Number(e.target.value))}
          />
        </label>
        <label className="flex items-center gap-2 text-xs text-slate-400">
          <input
            type="checkbox"
            checked={incentiveApplied}
            onChange={(e) => setIncentiveApplied(e.target.checked)}
          />
          Apply 18% purchase incentive to the electric vehicle
        </label>
        <label className="flex items-center gap-2 text-xs text-slate-400">
          <input
            type="checkbox"
            checked={mode === "INTERPOLATED"}
            onChange={(e) => setMode(e.target.checked ? "INTERPOLATED" : "INTEGER")}
          />
          Fractional break-even year
        </label>
      </section>

      <button
        type="button"
        onClick={() => runSimulation()}
        className="w-full py-2 rounded bg-emerald-600 hover:bg-emerald-500 text-white text-sm font-semibold"
      >
        Update simulation
      </button>
    </aside>
  );
}
