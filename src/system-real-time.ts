import { undefinedSystemRealTimeMessage } from "./errors";

export type SystemRealTimeMsg = "timingClock" | "start" | "continue" | "stop" | "activeSensing" | "systemReset";

const REAL_TIME_STATUS: Record<SystemRealTimeMsg, number> = {
  timingClock: 0xf8,
  start: 0xfa,
  continue: 0xfb,
  stop: 0xfc,
  activeSensing: 0xfe,
  systemReset: 0xff,
};

export function isRealTimeStatus(status: number): boolean {
  return status >= 0xf8 && status <= 0xff && status !== 0xf9 && status !== 0xfd;
}

export function systemRealTimeByte(msg: SystemRealTimeMsg): number {
  return REAL_TIME_STATUS[msg];
}

export function decodeSystemRealTime(status: number): SystemRealTimeMsg {
  switch (status) {
    case 0xf8:
      return "timingClock";
    case 0xfa:
      return "start";
    case 0xfb:
      return "continue";
    case 0xfc:
      return "stop";
    case 0xfe:
      return "activeSensing";
    case 0xff:
      return "systemReset";
    default:
      throw undefinedSystemRealTimeMessage(status);
  }
}
