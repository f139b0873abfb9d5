/**
 * Payback Store
 * Holds the simulator's selections and the result of the last run
 */

import { create } from "zustand";
import type { VehicleDatabase } from "../lib/data/vehicle_database";
import { PaybackError, PaybackErrorKind, isPaybackError } from "../lib/model/errors";
import { simulate } from "../lib/model/simulation";
import type { BreakEvenMode, SimulationResult, VehicleProfile } from "../lib/model/types";
import { findVehicle } from "../lib/model/vehicle_catalog";
import { showToast } from "../lib/utils/toast";

export const DISTANCE_RANGE = { min: 5_000, max: 40_000, step: 1_000, initial: 15_000 } as const;
export const HORIZON_RANGE = { min: 1, max: 15, step: 1, initial: 10 } as const;

export interface SimulationRun extends SimulationResult {
  vehicleA: VehicleProfile;
  vehicleB: VehicleProfile;
  annualDistanceKm: number;
  horizonYears: number;
  incentiveApplied: boolean;
}

interface PaybackStore {
  database: VehicleDatabase | null;
  selectedCombustion: string | null;
  selectedElectric: string | null;
  annualDistanceKm: number;
  horizonYears: number;
  incentiveApplied: boolean;
  mode: BreakEvenMode;

  lastRun: SimulationRun | null;
  error: { kind: PaybackErrorKind; message: string } | null;

  // Actions
  loadDatabase: (database: VehicleDatabase) => void;
  selectCombustion: (name: string) => void;
  selectElectric: (name: string) => void;
  setAnnualDistance: (km: number) => void;
  setHorizonYears: (years: number) => void;
  setIncentiveApplied: (applied: boolean) => void;
  setMode: (mode: BreakEvenMode) => void;
  runSimulation: () => SimulationRun | null;
  reset: () => void;
}

function clampToRange(value: number, range: { min: number; max: number; step: number }, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  const stepped = Math.round(value / range.step) * range.step;
  return Math.min(range.max, Math.max(range.min, stepped));
}

type Selections = Pick<
  PaybackStore,
  | "selectedCombustion"
  | "selectedElectric"
  | "annualDistanceKm"
  | "horizonYears"
  | "incentiveApplied"
  | "mode"
  | "lastRun"
  | "error"
>;

const initialSelections: Selections = {
  selectedCombustion: null,
  selectedElectric: null,
  annualDistanceKm: DISTANCE_RANGE.initial,
  horizonYears: HORIZON_RANGE.initial,
  incentiveApplied: false,
  mode: "INTEGER",
  lastRun: null,
  error: null,
};

export const usePaybackStore = create<PaybackStore>((set, get) => ({
  database: null,
  ...initialSelections,

  loadDatabase: (database) =>
    set({
      database,
      selectedCombustion: database.catalog.combustion[0]?.name ?? null,
      selectedElectric: database.catalog.electric[0]?.name ?? null,
      lastRun: null,
      error: null,
    }),
  selectCombustion: (name) => set({ selectedCombustion: name }),
  selectElectric: (name) => set({ selectedElectric: name }),
  setAnnualDistance: (km) =>
    set((state) => ({ annualDistanceKm: clampToRange(km, DISTANCE_RANGE, state.annualDistanceKm) })),
  setHorizonYears: (years) =>
    set((state) => ({ horizonYears: clampToRange(years, HORIZON_RANGE, state.horizonYears) })),
  setIncentiveApplied: (applied) => set({ incentiveApplied: applied }),
  setMode: (mode) => set({ mode }),

  runSimulation: () => {
    const state = get();
    try {
      if (!state.database) {
        throw new PaybackError("InvalidInput", "No vehicle database loaded");
      }
      if (!state.selectedCombustion || !state.selectedElectric) {
        throw new PaybackError("InvalidInput", "Select one combustion and one electric vehicle");
      }
      const vehicleA = findVehicle(state.database.catalog.combustion, state.selectedCombustion);
      const vehicleB = findVehicle(state.database.catalog.electric, state.selectedElectric);

      const result = simulate(
        {
          vehicleA,
          vehicleB,
          annualDistanceKm: state.annualDistanceKm,
          horizonYears: state.horizonYears,
          incentiveApplied: state.incentiveApplied,
          mode: state.mode,
        },
        state.database.rates
      );

      const run: SimulationRun = {
        ...result,
        vehicleA,
        vehicleB,
        annualDistanceKm: state.annualDistanceKm,
        horizonYears: state.horizonYears,
        incentiveApplied: state.incentiveApplied,
      };
      set({ lastRun: run, error: null });
      return run;
    } catch (error) {
      if (!isPaybackError(error)) {
        throw error;
      }
      console.error(`[PaybackStore] Simulation failed (${error.kind}):`, error.message);
      set({ lastRun: null, error: { kind: error.kind, message: error.message } });
      showToast(error.message, "error");
      return null;
    }
  },

  reset: () => set({ database: null, ...initialSelections }),
}));
