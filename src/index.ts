import { config, isBackendConfigured } from "./config/env.js";
import { errorMessage } from "./lib/errors.js";
import { createManagerApp } from "./manager/app.js";
import { createDockerRuntime } from "./manager/docker-runtime.js";

const runtime = createDockerRuntime({ timeoutMs: config.docker.timeoutMs });
const { service } = createManagerApp({ config, runtime });
const { log } = service;

if (!isBackendConfigured(config.backend)) {
  log.warn("AI backend not configured: set AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_API_KEY; agent creation will fail");
}

void runtime.ping()
  .then(() => log.info("container engine reachable", { image: config.container.image }))
  .catch((err: unknown) => {
    log.warn(`container engine unreachable: ${errorMessage(err)}`);
  });

service.start();

log.info("agent manager started", {
  port: config.server.port,
  publicHost: config.server.publicHost,
  image: config.container.image,
  defaultModel: config.defaults.model,
});
