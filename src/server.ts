import { createApp } from './app.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const container = new AppContainer();
const app = createApp(container);
const { port } = container.config.app;

app.listen(port, () => {
  container.logger.info(`Transaction ingestion API listening on port ${port}`);
  container.logger.info(`Storage driver: ${container.config.storage.driver}`);
  container.logger.info(`Default currency: ${container.config.ingestion.defaultCurrency}`);
});
