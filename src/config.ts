import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    IMAGESET_REPORT_DIR: t.String({ default: "dist/reports" }),
  })
);
