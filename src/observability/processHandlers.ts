import { logError } from "./logger";

export type ProcessHandlerOptions = {
  /** Invoked once after an uncaught exception so the server can drain and exit. */
  onFatal: (reason: string) => void;
};

let installed = false;

export function installProcessHandlers(options: ProcessHandlerOptions): void {
  if (installed) {
    return;
  }
  installed = true;
  let fatalSeen = false;

  process.on("unhandledRejection", (reason) => {
    logError("unhandled_rejection", {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });

  process.on("uncaughtException", (error) => {
    logError("uncaught_exception", { error: error.message, stack: error.stack });
    process.exitCode = 1;
    if (!fatalSeen) {
      fatalSeen = true;
      options.onFatal("uncaughtException");
    }
  });
}
