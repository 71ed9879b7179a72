export * from "./bytes";
export * from "./errors";
export * from "./time-code";
export * from "./context";
export * from "./parameter";
export * from "./control-change";
export * from "./channel-voice";
export * from "./channel-mode";
export * from "./system-common";
export * from "./system-real-time";
export * from "./sysex/ids";
export * from "./sysex/sample-dump";
export * from "./sysex/file-dump";
export * from "./sysex/file-reference";
export * from "./sysex/tuning";
export * from "./sysex/cueing";
export * from "./sysex/global-parameter";
export * from "./sysex/controller";
export * from "./sysex/machine-control";
export * from "./sysex/real-time";
export * from "./sysex/non-real-time";
export * from "./sysex/system-exclusive";
export * from "./meta";
export * from "./message";
export * from "./file";
export * from "./general-midi";
export * from "./stream";
