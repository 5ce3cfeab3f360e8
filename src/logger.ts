import pino from "pino";

// stdout belongs to the CLI; logs always go to stderr.
export const logger = pino(
  {
    name: "package-snapshot",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  },
  pino.destination({ dest: 2, sync: true }),
);
