import "dotenv/config";
import { urlAnalysisBatchTask, urlAnalysisTask } from "./trigger/url-analysis";

// Entry point - registers tasks with Trigger.dev
console.log("Worker initialized with tasks:", {
    urlAnalysis: urlAnalysisTask.id,
    urlAnalysisBatch: urlAnalysisBatchTask.id,
});
