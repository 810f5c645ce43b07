export type PresetName = "dashboard" | "integrated" | "modern";
export type SessionState = "Idle" | "Starting" | "Running" | "Stopping" | "Stopped";
export type MonitorOutcome = "interrupted" | "child-exited";
export type ProcessLabel = "Server" | "API";
