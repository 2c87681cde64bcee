import { runTriggerScript } from "./run-trigger";

await runTriggerScript("ingest", "Ingest");
