interface LogContext {
  sessionId?: string;
  eventId?: string;
  callId?: string;
  /** URL or remote address the line is about. */
  peer?: string;
}

function contextPrefix(context?: LogContext): string {
  if (!context) {
    return "";
  }

  const parts: string[] = [];
  if (context.sessionId) parts.push(`session=${context.sessionId}`);
  if (context.eventId) parts.push(`event=${context.eventId}`);
  if (context.callId) parts.push(`call=${context.callId}`);
  if (context.peer) parts.push(`peer=${context.peer}`);

  return parts.length ? `[${parts.join(" ")}] ` : "";
}

export const logger = {
  debug(message: string, context?: LogContext): void {
    if ((process.env.LOG_LEVEL ?? "").toUpperCase() === "DEBUG") {
      console.debug(`${new Date().toISOString()} DEBUG ${contextPrefix(context)}${message}`);
    }
  },

  info(message: string, context?: LogContext): void {
    console.log(`${new Date().toISOString()} INFO ${contextPrefix(context)}${message}`);
  },

  warn(message: string, context?: LogContext): void {
    console.warn(`${new Date().toISOString()} WARN ${contextPrefix(context)}${message}`);
  },

  error(message: string, context?: LogContext): void {
    console.error(`${new Date().toISOString()} ERROR ${contextPrefix(context)}${message}`);
  },
};
