// scripts/handout.ts
import { config } from "dotenv";
import path from "node:path";
import { getHandoutConfig } from "@/lib/config/handout";
import { runHandoutCli } from "@/lib/cli/handoutCli";

// Load .env.local first, then .env
config({ path: path.resolve(process.cwd(), ".env.local") });
config({ path: path.resolve(process.cwd(), ".env") });

process.exitCode = await runHandoutCli(process.argv.slice(2), { config: getHandoutConfig() });
