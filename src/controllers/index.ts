export * as extractionController from "./extraction";
