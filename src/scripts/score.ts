import { runTriggerScript } from "./run-trigger";

await runTriggerScript("score", "Scoring");
