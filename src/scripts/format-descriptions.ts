import { runTriggerScript } from "./run-trigger";

await runTriggerScript("format", "Description Formatting");
