// Service worker bundle entry point.
import { installServiceWorker, isWorkerScope } from "./service-worker.ts";

const scope: unknown = globalThis;

if (isWorkerScope(scope)) {
  installServiceWorker(scope);
}
