import { logger, type LogDetails } from "./logger.js";

export function sleep(seconds: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, seconds * 1000));
}

export function secondsElapsed(startTime: number, nowDate: Date | null = null) {
  nowDate = nowDate || new Date();

  return (nowDate.getTime() - startTime) / 1000;
}

export function timedRun<T>(
  promise: Promise<T>,
  seconds: number,
  message = "Promise timed out",
  logDetails: LogDetails = {},
): Promise<T | undefined> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => {
      logger.warn(message, { seconds, ...logDetails });
      resolve(undefined);
    }, seconds * 1000);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
