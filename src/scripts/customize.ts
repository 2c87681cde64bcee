import { runTriggerScript } from "./run-trigger";

await runTriggerScript("customize", "Resume Customization");
