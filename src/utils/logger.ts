import * as winston from "winston";
import * as path from "node:path";
import * as fs from "node:fs";
import Transport from "winston-transport";
import axios from "axios";
import Config from "../core/config/index";

// --- Custom `notify` level for operator-facing health transitions ---
const customLogLevels = {
  levels: {
    error: 0,
    warn: 1,
    notify: 2,
    info: 3,
    http: 4,
    verbose: 5,
    debug: 6,
    silly: 7,
  },
  colors: {
    error: "red",
    warn: "yellow",
    notify: "blue",
    info: "green",
    http: "magenta",
    verbose: "cyan",
    debug: "white",
    silly: "grey",
  },
};

interface FlowLogger extends winston.Logger {
  notify: winston.LeveledLogMethod;
}

winston.addColors(customLogLevels.colors);

const logsDir = path.join(process.cwd(), "logs");
const archiveDir = path.join(logsDir, "archive");

// Archive old logs when the process starts
function archiveOldLogs() {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
  if (!fs.existsSync(archiveDir)) {
    fs.mkdirSync(archiveDir, { recursive: true });
  }

  const logFiles = ["error.log", "info.log", "combined.log"];
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");

  for (const logFile of logFiles) {
    const logPath = path.join(logsDir, logFile);
    if (fs.existsSync(logPath)) {
      try {
        const archivePath = path.join(archiveDir, `${timestamp}_${logFile}`);
        fs.copyFileSync(logPath, archivePath);
        fs.truncateSync(logPath, 0);
        console.log(`Archived ${logFile} to ${archivePath}`);
      } catch (err) {
        console.error(`Failed to archive ${logFile}:`, err);
      }
    }
  }
}

function convertJsToTsPath(jsPath: string): string {
  const projectRoot = process.cwd();
  if (jsPath.endsWith(".ts")) {return jsPath;}
  let tsPath = jsPath;
  if (jsPath.endsWith(".js")) {tsPath = jsPath.replace(/\.js$/, ".ts");}
  if (tsPath.includes("/dist/")) {
    tsPath = tsPath.replace(/\/dist\//, "/src/");
  }
  if (tsPath.startsWith(projectRoot) && !tsPath.includes("/src/") && !tsPath.includes("node_modules")) {
    const relativePath = path.relative(projectRoot, tsPath);
    tsPath = path.join(projectRoot, "src", relativePath);
  }
  return tsPath;
}

function getCallerInfo() {
  const originalStackTraceLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = 20;
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, getCallerInfo);
  const stackLines = holder.stack?.split("\n").slice(1) || [];
  Error.stackTraceLimit = originalStackTraceLimit;

  for (const line of stackLines) {
    const match = line.match(/\(([^:]+):(\d+):\d+\)/) || line.match(/at\s+([^:]+):(\d+):\d+/);
    if (match) {
      const [, file, lineNumber] = match;
      if (
        file.includes("node_modules/winston") ||
        file.includes("node_modules/logform") ||
        file.includes("node_modules/readable-stream") ||
        file.includes("internal/") ||
        file.includes("node:") ||
        file.includes("/utils/logger") ||
        file.includes("_stream_transform.js")
      ) {
        continue;
      }
      const tsPath = convertJsToTsPath(file);
      return {
        file: tsPath,
        line: Number.parseInt(lineNumber, 10),
        function: line.match(/at\s+([^(]+)\s+\(/)?.[1]?.trim() || "anonymous",
      };
    }
  }
  return { file: "unknown", line: 0, function: "anonymous" };
}

const fileAndLine = winston.format((info) => {
  const stackInfo = getCallerInfo();
  if (stackInfo.file !== "unknown") {
    const projectPath = stackInfo.file.replace(process.cwd(), "");
    const relativePath = projectPath.startsWith("/") ? projectPath.substring(1) : projectPath;
    info.logpath = `${relativePath}:${stackInfo.line}`;
    info.function = stackInfo.function;
  } else {
    info.logpath = "unknown:0";
    info.function = "anonymous";
  }
  return info;
});

// ---------------------------------------------------------
// Alert webhook transport: forwards errors and notifications
// ---------------------------------------------------------
interface AlertWebhookTransportOptions extends Transport.TransportStreamOptions {
  webhookUrl: string;
}

interface AlertLogInfo {
  level: string;
  message: unknown;
  timestamp?: string;
  logpath?: string;
  function?: string;
  [key: string]: unknown;
}

class AlertWebhookTransport extends Transport {
  private webhookUrl: string;

  constructor(opts: AlertWebhookTransportOptions) {
    super(opts);
    this.webhookUrl = opts.webhookUrl;
  }

  log(info: AlertLogInfo, callback: () => void): void {
    setImmediate(() => {
      this.emit("logged", info);
    });

    if (info.level === "error" || info.level === "notify") {
      void this.sendAlert(info);
    }

    callback();
  }

  private async sendAlert(info: AlertLogInfo): Promise<void> {
    try {
      const title = info.level === "error"
        ? `ERROR: ${info.function || "Unknown Context"}`
        : `NOTIFICATION: ${info.function || "General"}`;

      await axios.post(this.webhookUrl, {
        username: "flowwatch",
        title,
        message: String(info.message),
        source: info.logpath,
        time: info.timestamp,
      });
    } catch (error) {
      // console only: logging here would loop back into this transport
      console.error("Failed to send alert webhook:", error);
    }
  }
}

const transportsList: winston.transport[] = [];

if (!Config.SILENT) {
  archiveOldLogs();
  transportsList.push(
    new winston.transports.File({ filename: path.join(logsDir, "error.log"), level: "error" }),
    new winston.transports.File({ filename: path.join(logsDir, "info.log"), level: "info" }),
    new winston.transports.File({ filename: path.join(logsDir, "combined.log") }),
  );
}

if (Config.ALERT_WEBHOOK_URL && Config.ENABLE_ALERT_WEBHOOK) {
  transportsList.push(new AlertWebhookTransport({ webhookUrl: Config.ALERT_WEBHOOK_URL }));
  console.log("Alert webhook enabled - errors and notifications will be forwarded");
} else if (Config.ALERT_WEBHOOK_URL && !Config.ENABLE_ALERT_WEBHOOK) {
  console.log("Alert webhook configured but disabled (set ENABLE_ALERT_WEBHOOK=true to enable)");
}

export const logger = winston.createLogger({
  level: Config.LOG_LEVEL,
  levels: customLogLevels.levels,
  silent: Config.SILENT,
  format: winston.format.combine(
    fileAndLine(),
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: transportsList,
}) as FlowLogger;

logger.add(
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf((info) => {
        return `${String(info.timestamp)} [${String(info.logpath)}] ${info.level}: ${String(info.message)}`;
      }),
    ),
  }),
);
