import { parentPort } from "worker_threads";
import { processSourceFile } from "./fileProcessor.js";
import type { WorkerRequest, WorkerResponse } from "./workerPool.js";

parentPort?.on("message", (msg: WorkerRequest) => {
  let response: WorkerResponse;
  try {
    response = {
      taskId: msg.taskId,
      outcome: processSourceFile(msg.file, msg.options),
    };
  } catch (error) {
    response = {
      taskId: msg.taskId,
      error: error instanceof Error ? error.message : String(error),
      code:
        error instanceof Error && "code" in error && typeof error.code === "string"
          ? error.code
          : undefined,
    };
  }
  parentPort?.postMessage(response);
});
