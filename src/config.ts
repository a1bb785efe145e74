import { Type as t } from "@sinclair/typebox";
import os from "node:os";
import path from "node:path";

import { buildConfigFactoryEnv, envInteger } from "~shared/ConfigFactory";

import { defaultGapSeconds } from "@/constants";

export const getPanoConfig = buildConfigFactoryEnv(
  t.Object({
    PANO_GAP_SECONDS: envInteger({ minimum: 0, default: defaultGapSeconds }),
    PANO_DEFAULT_STYLE: t.Optional(t.String()),
    PANO_STYLE_DIR: t.Optional(t.String()),
    XDG_CONFIG_HOME: t.Optional(t.String()),
  })
);

export type PanoConfig = ReturnType<typeof getPanoConfig>;

export function resolveStyleDir(config: PanoConfig) {
  if (config.PANO_STYLE_DIR) return config.PANO_STYLE_DIR;
  const configHome =
    config.XDG_CONFIG_HOME ?? path.join(os.homedir(), ".config");
  return path.join(configHome, "darktable", "styles");
}
