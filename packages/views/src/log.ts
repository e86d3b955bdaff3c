import { createLogger } from "@lazyview/core";

export const log = createLogger("views");
