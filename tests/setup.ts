import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

// Quiet logs and keep stored defaults away from the user's real config.
process.env.LOG_LEVEL = "error";
process.env.DUALMODE_CONFIG_DIR = mkdtempSync(join(tmpdir(), "dualmode-config-"));
