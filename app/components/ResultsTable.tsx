"use client";

import React, { useState } from "react";
import { toTableRows } from "../lib/model/presentation";
import type { CostProjection } from "../lib/model/types";
import { formatUsd } from "../lib/utils/formatNumber";

interface ResultsTableProps {
  projection: CostProjection;
  nameA: string;
  nameB: string;
}

export default function ResultsTable({ projection, nameA, nameB }: ResultsTableProps) {
  const [expanded, setExpanded] = useState(false);
  const rows = toTableRows(projection);

  return (
    <div className="border border-slate-700 rounded-lg">
      <button
        type="button"
        onClick={() => setExpanded(!expanded)}
        className="w-full text-left px-4 py-2 text-sm font-semibold text-slate-300"
      >
        {expanded ? "▾" : "▸"} Show results table
      </button>
      {expanded && (
        <table className="w-full text-xs font-mono">
          <thead>
            <tr className="text-slate-400 border-b border-slate-700">
              <th className="px-4 py-1 text-left">Year</th>
              <th className="px-4 py-1 text-right">{nameA}</th>
              <th className="px-4 py-1 text-right">{nameB}</th>
              <th className="px-4 py-1 text-right">Difference (USD)</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((row) => (
              <tr key={row.year} className="border-b border-slate-800 text-slate-200">
                <td className="px-4 py-1">{row.year}</td>
                <td className="px-4 py-1 text-right">{formatUsd(row.costA)}</td>
                <td className="px-4 py-1 text-right">{formatUsd(row.costB)}</td>
                <td className={`px-4 py-1 text-right ${row.difference >= 0 ? "text-emerald-400" : "text-red-400"}`}>
                  {formatUsd(row.difference)}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  );
}
