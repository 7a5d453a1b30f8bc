import type { Bounds } from "../geometry/bounds.js";
import { HeadlessMenuHost, type TextMeasurer } from "../host/HeadlessMenuHost.js";
import type { MenuImage } from "../host/types.js";
import { createLogger, type MenuLogger } from "../logging/logger.js";
import type { GrowDirection } from "../placement/directives.js";
import { MenuSpawner } from "../session/MenuSpawner.js";
import type { StyleConfigInput } from "../style/StyleConfig.js";

export const ARROW: MenuImage = { width: 8, height: 8, src: "arrow.png" };

/** Every character is 6px wide; every line is 14px tall. */
export const measureMono: TextMeasurer = (text) => ({ width: text.length * 6, height: 14 });

function messageOf(line: string): string {
  const parsed: unknown = JSON.parse(line);
  if (parsed && typeof parsed === "object" && "msg" in parsed && typeof parsed.msg === "string") {
    return parsed.msg;
  }
  return "";
}

export type CapturedLogger = {
  logger: MenuLogger;
  messages(): string[];
};

export function captureLogger(): CapturedLogger {
  const lines: string[] = [];
  const logger = createLogger({
    level: "debug",
    destination: {
      write(msg: string) {
        lines.push(msg);
      },
    },
  });
  return { logger, messages: () => lines.map(messageOf) };
}

export type TestSpawnerOptions = {
  screen?: Bounds;
  scale?: number;
  style?: StyleConfigInput;
  growDirection?: GrowDirection;
  measureText?: TextMeasurer;
};

export function createTestSpawner(options: TestSpawnerOptions = {}) {
  const { logger, messages } = captureLogger();
  const host = new HeadlessMenuHost({
    screen: options.screen,
    scale: options.scale,
    measureText: options.measureText ?? measureMono,
  });
  const spawner = new MenuSpawner({
    host,
    logger,
    style: { submenuArrow: ARROW, useGoBack: false, ...options.style },
    growDirection: options.growDirection,
  });
  return { host, spawner, messages };
}
