import { assertConfig, config } from "./config";
import { createPipeline } from "./pipeline";
import { buildApp } from "./serverApp";

const { runs, runner } = createPipeline();
const app = buildApp({ runs, runner });

const start = async (): Promise<void> => {
  assertConfig();
  await app.listen({ port: config.port, host: "0.0.0.0" });
};

start().catch((error) => {
  app.log.error(error);
  process.exit(1);
});
