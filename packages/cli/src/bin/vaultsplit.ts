#!/usr/bin/env -S node --import tsx
import { config as loadDotenv } from "dotenv";
import { VaultsplitEntrypoint } from "./VaultsplitEntrypoint.js";

loadDotenv();

VaultsplitEntrypoint.run().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
