import express, { type Express } from 'express';
import cors from 'cors';
import { MboxWorkspace } from '@mbox-search/mbox-core';
import { config as defaultConfig, type ServerConfig } from './config';
import { errorHandler } from './middleware/error-handler';
import { createUpload } from './middleware/upload';
import { createMboxRouter } from './routes/mbox';

export interface AppOptions {
  config?: ServerConfig;
  /** One per app; tests pass their own */
  workspace?: MboxWorkspace;
}

export function createApp({ config = defaultConfig, workspace }: AppOptions = {}): Express {
  const app = express();
  const upload = createUpload(config.upload);

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json());
  app.use(
    '/api/mbox',
    createMboxRouter(workspace ?? new MboxWorkspace(config.loader), upload.single('mboxFile'))
  );
  app.use(errorHandler);
  return app;
}
