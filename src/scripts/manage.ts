import { runTriggerScript } from "./run-trigger";

await runTriggerScript("manage", "Lifecycle Management");
