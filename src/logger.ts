import pino from "pino";
import { config } from "./config.js";

// stdout carries the report, so logs go to stderr
export const logger = pino({ level: config.LOG_LEVEL }, pino.destination(2));
