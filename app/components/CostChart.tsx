"use client";

import React from "react";
import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
  ReferenceLine,
} from "recharts";
import { toChartSeries } from "../lib/model/presentation";
import type { BreakEvenResult, CostProjection } from "../lib/model/types";
import { formatCompactUsd, formatUsd } from "../lib/utils/formatNumber";

interface CostChartProps {
  projection: CostProjection;
  nameA: string;
  nameB: string;
  breakEven: BreakEvenResult;
}

/**
 * Cumulative cost of both vehicles, with the break-even year marked
 */
export default function CostChart({ projection, nameA, nameB, breakEven }: CostChartProps) {
  const { points, keyA, keyB } = toChartSeries(projection, nameA, nameB);

  return (
    <div className="w-full h-80">
      <h3 className="text-sm font-semibold text-slate-300 mb-2">Cumulative costs (USD)</h3>
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={points} margin={{ top: 10, right: 30, left: 10, bottom: 30 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#475569" opacity={0.6} />
          <XAxis
            dataKey="year"
            stroke="#94a3b8"
            style={{ fontSize: "11px" }}
            allowDecimals={false}
            label={{ value: "Years", position: "insideBottom", offset: -15, fill: "#94a3b8" }}
          />
          <YAxis stroke="#94a3b8" style={{ fontSize: "11px" }} tickFormatter={(value: number) => formatCompactUsd(value)} />
          <Tooltip
            formatter={(value) => (typeof value === "number" ? formatUsd(value) : String(value))}
            labelFormatter={(year) => `Year ${year}`}
            contentStyle={{ backgroundColor: "#0f172a", border: "1px solid #334155", fontSize: "12px" }}
          />
          <Legend verticalAlign="top" />
          <Line type="linear" dataKey={keyA} stroke="#f97316" strokeWidth={2} dot={{ r: 3 }} />
          <Line type="linear" dataKey={keyB} stroke="#10b981" strokeWidth={2} dot={{ r: 3 }} />
          {breakEven.status === "REACHED" && (
            <ReferenceLine x={breakEven.bracket.to} stroke="#06b6d4" strokeDasharray="4 4" />
          )}
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
