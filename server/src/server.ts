import "dotenv/config";

import {
  RpcBridgeServer,
  ToolRegistry,
  buildEmailDelivery,
  createSendEmailTool,
} from "relay-agent-backend";
import { SERVICE_NAME, SERVICE_VERSION, createApp } from "./app.js";
import { loadConfig, loadToolEndpoints } from "./core/config.js";
import { ConductorService } from "./core/conductorService.js";
import { logger } from "./core/logger.js";
import { buildProvider } from "./providers/index.js";
import { registerRemoteTools } from "./tools/remoteTools.js";

async function main(): Promise<void> {
  const config = loadConfig();

  const registry = new ToolRegistry({ extraArguments: config.extraArguments });
  if (config.localEmailTool) {
    registry.register(createSendEmailTool(buildEmailDelivery({
      delivery: config.emailDelivery,
      apiUrl: config.emailApiUrl,
      region: config.provider.awsRegion,
    })));
  }
  await registerRemoteTools(registry, loadToolEndpoints(config.toolSettingsPath), {
    clientName: SERVICE_NAME,
    clientVersion: SERVICE_VERSION,
  });
  registry.seal();

  if (registry.list().length === 0) {
    logger.warn("no tools registered; sessions will run without tools");
  }

  const provider = buildProvider(config.provider);
  const conductor = new ConductorService(provider, registry, config.conductor);
  const bridge = new RpcBridgeServer(registry, {
    serverInfo: { name: SERVICE_NAME, version: SERVICE_VERSION },
  });

  const { server } = createApp({
    conductor,
    registry,
    bridge,
    providerName: provider.name,
    maxEventBytes: config.maxEventBytes,
  });

  server.listen(config.port, () => {
    logger.info(
      `${SERVICE_NAME} listening on port ${config.port} using provider=${provider.name} ` +
      `with ${registry.list().length} tool(s)`,
    );
  });
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`startup failed: ${message}`);
  process.exitCode = 1;
});
