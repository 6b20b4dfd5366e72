import { parentPort, workerData } from "node:worker_threads";

import { summarizePerformance } from "@strategy-lab/metrics";
import { createStrategy } from "@strategy-lab/sdk";

import { simulate } from "./simulation.js";
import type { SimulationReply, SimulationRequest, SimulationWorkerData } from "./worker-pool.js";

const port = parentPort;
if (!port) {
  throw new Error("simulation-worker must be started as a worker thread");
}

const { bars, initialCapital, minimumNotional, riskFreeRate }: SimulationWorkerData = workerData;

port.on("message", ({ id, kind, parameters }: SimulationRequest) => {
  let reply: SimulationReply;
  try {
    const result = simulate(createStrategy(kind, parameters), bars, {
      initialCapital,
      minimumNotional,
    });
    reply = { id, ok: true, summary: summarizePerformance(result, riskFreeRate) };
  } catch (error) {
    reply = { id, ok: false, error: error instanceof Error ? error.message : String(error) };
  }
  port.postMessage(reply);
});
