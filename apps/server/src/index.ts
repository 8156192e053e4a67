import { logger, setLogLevel } from '@mbox-search/mbox-core';
import { createApp } from './app';
import { config } from './config';

setLogLevel(config.logLevel);
const app = createApp({ config });

app.listen(config.port, () => {
  logger.info(`MBOX search server running on http://localhost:${config.port}`);
});
