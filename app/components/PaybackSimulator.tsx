"use client";

import React, { useEffect } from "react";
import type { VehicleDatabase } from "../lib/data/vehicle_database";
import { formatUsd } from "../lib/utils/formatNumber";
import { usePaybackStore } from "../store/paybackStore";
import BreakEvenBanner from "./BreakEvenBanner";
import CostChart from "./CostChart";
import ResultsTable from "./ResultsTable";
import SimulationControls from "./SimulationControls";
import Toast from "./Toast";

export default function PaybackSimulator({ database }: { database: VehicleDatabase }) {
  const loadDatabase = usePaybackStore((s) => s.loadDatabase);
  const lastRun = usePaybackStore((s) => s.lastRun);
  const error = usePaybackStore((s) => s.error);

  useEffect(() => {
    loadDatabase(database);
  }, [database, loadDatabase]);

  return (
    <div className="flex flex-col md:flex-row gap-6">
      <Toast />
      <SimulationControls />
      <main className="flex-1 space-y-6">
        {error && (
          <div className="p-3 rounded-lg border bg-red-950 border-red-600 text-red-200 text-sm">{error.message}</div>
        )}
        {!lastRun && !error && (
          <div className="p-3 rounded-lg border bg-slate-900 border-slate-700 text-slate-300 text-sm">
            Use the button on the left to run the simulation.
          </div>
        )}
        {lastRun && (
          <>
            <div className="grid grid-cols-2 gap-4 text-xs text-slate-400">
              <div>
                {lastRun.vehicleA.name}: {formatUsd(lastRun.purchasePriceA)} + {formatUsd(lastRun.annualCostA)}/year
              </div>
              <div>
                {lastRun.vehicleB.name}: {formatUsd(lastRun.purchasePriceB)} + {formatUsd(lastRun.annualCostB)}/year
                {lastRun.incentiveApplied && " (incentive applied)"}
              </div>
            </div>
            <CostChart
              projection={lastRun.projection}
              nameA={lastRun.vehicleA.name}
              nameB={lastRun.vehicleB.name}
              breakEven={lastRun.breakEven}
            />
            <BreakEvenBanner result={lastRun.breakEven} electricName={lastRun.vehicleB.name} />
            <ResultsTable projection={lastRun.projection} nameA={lastRun.vehicleA.name} nameB={lastRun.vehicleB.name} />
          </>
        )}
      </main>
    </div>
  );
}
