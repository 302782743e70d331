import { createApp } from './app';
import config from './config/config';
import logger from './utils/logger';

const app = createApp();

// Start the server
const PORT = config.port;
app.listen(PORT, () => {
  logger.info(`Server is running on port ${PORT}`);

  const { sulid } = config;
  if (sulid.version === 'v1') {
    logger.info(`SULID v1 generator: data center ${sulid.dataCenterId}, machine ${sulid.machineId}`);
  } else {
    logger.info(`SULID v2 generator: worker ${sulid.workerId}`);
  }
});
