import { Request, Response } from "express";
import morgan from "morgan";
import chalk from "chalk";
import { SESSION_COOKIE } from "./session.middleware";

const METHOD_COLORS: Record<string, chalk.Chalk> = {
  GET: chalk.green,
  POST: chalk.yellow,
  PUT: chalk.blue,
  DELETE: chalk.red,
  PATCH: chalk.magenta,
};

const colorStatus = (status: number): string => {
  if (status >= 500) return chalk.red(status);
  if (status >= 400) return chalk.yellow(status);
  if (status >= 300) return chalk.cyan(status);
  return chalk.green(status);
};

morgan.token<Request, Response>("timestamp", () =>
  chalk.gray(new Date().toISOString())
);

morgan.token<Request, Response>("colored-method", (req) => {
  const color = METHOD_COLORS[req.method] ?? chalk.white;
  return color(req.method);
});

morgan.token<Request, Response>("colored-status", (_req, res) =>
  colorStatus(res.statusCode)
);

morgan.token<Request, Response>("colored-url", (req) => chalk.cyan(req.originalUrl));

// First 8 characters of the session id, enough to follow one visitor
morgan.token<Request, Response>("session", (req) => {
  const id: unknown = req.cookies?.[SESSION_COOKIE];
  return typeof id === "string" ? id.slice(0, 8) : "-";
});

export const requestLogger = morgan<Request, Response>(
  chalk.gray("[") +
    ":timestamp" +
    chalk.gray("]") +
    chalk.white(" INCOMING_REQUEST: ") +
    chalk.white("method=") +
    ":colored-method" +
    chalk.white(", uri=") +
    ":colored-url" +
    chalk.white(", status=") +
    ":colored-status" +
    chalk.white(", session=") +
    ":session" +
    chalk.white(", response-time=") +
    chalk.magenta(":response-time ms"),
  {
    skip: () => (process.env.LOG_LEVEL || "").toLowerCase() === "silent",
  }
);
