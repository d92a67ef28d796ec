import run from "./index.ts";
import { createNodeHost } from "./NodeHost.ts";

process.exitCode = await run(createNodeHost(), process.argv.slice(2));
