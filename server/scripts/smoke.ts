import { WebSocket } from "ws";

const baseURL = process.env.SMOKE_WS_URL ?? "ws://localhost:8080/ws";
const prompt = process.env.SMOKE_PROMPT ??
  "Send an email to someone@example.com from sender@example.com with subject Hello and content Testing the relay.";
const maxTurns = Number(process.env.SMOKE_MAX_TURNS ?? 5);

const socket = new WebSocket(baseURL);

socket.on("open", () => {
  console.log(`connected to ${baseURL}`);
  socket.send(JSON.stringify({ prompt, max_turns: maxTurns }));
});

socket.on("message", (raw) => {
  const text = Buffer.isBuffer(raw) ? raw.toString("utf8") : String(raw);
  try {
    const event: unknown = JSON.parse(text);
    console.log(describe(event));
  } catch {
    console.log(text);
  }
});

socket.on("close", (code, reason) => {
  console.log(`socket closed (${code} ${reason.toString()})`);
  process.exit(0);
});

socket.on("error", (error) => {
  console.error(`socket error: ${error.message}`);
  process.exit(1);
});

setTimeout(() => {
  console.log("no terminal event in time; cancelling");
  socket.send(JSON.stringify({ type: "cancel" }));
}, Number(process.env.SMOKE_DURATION_MS ?? 60_000)).unref();

function describe(event: unknown): string {
  if (typeof event !== "object" || event === null || !("kind" in event)) {
    return JSON.stringify(event);
  }
  const payload = "payload" in event ? event.payload : undefined;
  const name = typeof payload === "object" && payload !== null && "name" in payload ? ` (${String(payload.name)})` : "";
  return `#${"sequence" in event ? String(event.sequence) : "?"} ${String(event.kind)}${name} ${JSON.stringify(payload)}`;
}
