import { runTriggerScript } from "./run-trigger";

await runTriggerScript("parse-resume", "Resume Parsing");
