import { defineWorkspace } from "vitest/config";

export default defineWorkspace(["packages/kit", "packages/tuner", "packages/runner"]);
