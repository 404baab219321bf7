export { postTriggerExtraction } from "./postTriggerExtraction";
export { getExtractionStatus } from "./getExtractionStatus";
