import PaybackSimulator from "./components/PaybackSimulator";
import { loadVehicleDatabase } from "./lib/data/vehicle_database";
import { isPaybackError } from "./lib/model/errors";

export const dynamic = "force-dynamic";

export default function Home() {
  let content: React.ReactNode;
  try {
    content = <PaybackSimulator database={loadVehicleDatabase()} />;
  } catch (error) {
    if (!isPaybackError(error)) throw error;
    console.error(`[Home] Could not load vehicle database (${error.kind}):`, error.message);
    content = (
      <div className="p-3 rounded-lg border bg-red-950 border-red-600 text-red-200 text-sm">{error.message}</div>
    );
  }

  return (
    <div className="max-w-6xl mx-auto p-6 space-y-6">
      <h1 className="text-2xl font-bold">Payback period simulator: hybrid and electric vehicles</h1>
      {content}
    </div>
  );
}
