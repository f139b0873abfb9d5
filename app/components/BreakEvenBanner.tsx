import React from "react";
import { describeBreakEven } from "../lib/model/presentation";
import type { BreakEvenResult } from "../lib/model/types";

export default function BreakEvenBanner({ result, electricName }: { result: BreakEvenResult; electricName: string }) {
  const reached = result.status !== "NOT_REACHED";

  return (
    <div
      className={`p-3 rounded-lg border text-sm font-semibold ${
        reached ? "bg-emerald-950 border-emerald-600 text-emerald-200" : "bg-blue-950 border-blue-600 text-blue-200"
      }`}
    >
      {describeBreakEven(result, electricName)}
    </div>
  );
}
