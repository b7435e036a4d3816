import { createApp } from './app';
import { appConfig, configIssues } from './connections/config/app.config';
import { connectDatabase } from './connections/db/connection';
import { CartSessions } from './modules/cart/cart.sessions';
import { PantryService } from './modules/pantry/pantry.service';
import { createPantryStore } from './modules/store/store.service';
import { systemClock } from './utils/clock';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logging';

const PORT = appConfig.port;

const startServer = async () => {
  try {
    configIssues.forEach(issue => logger.warn(issue));
    logger.info('Initializing connections...');

    if (appConfig.storeDriver === 'postgres') {
      logger.info('Connecting to database...');
      await connectDatabase();
    } else {
      logger.warn('Using in-memory store, data is lost on restart');
    }

    const pantry = new PantryService(createPantryStore(appConfig.storeDriver), systemClock, {
      historyRetention: appConfig.historyRetention,
    });
    const app = createApp({ pantry, carts: new CartSessions() });

    app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', { error: errorMessage(error) });
    process.exit(1);
  }
};

startServer();
