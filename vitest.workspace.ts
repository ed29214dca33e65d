import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/types",
  "packages/event-store",
  "packages/custody",
  "packages/node",
]);
