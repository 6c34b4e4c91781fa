export * as assessment from "./assessment"
