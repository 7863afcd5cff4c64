/**
 * Deployment
 *
 * Wires the storage root, the database and the image service together and
 * runs the one-time startup steps. Any failure here aborts startup.
 */

import { connect, type DBService } from '@photodrop/db';
import type { AppConfig } from './config.js';
import { ImageService } from './image.js';
import { noopLogger, type Logger } from './logger.js';
import { StorageService } from './storage.js';

export type DeploymentConfig = Pick<AppConfig, 'databaseUrl' | 'uploadDir' | 'orphanPolicy'> &
  Partial<Pick<AppConfig, 'databaseMaxConnections'>>;

export interface Deployment {
  db(): DBService;
  storage(): StorageService;
  images(): ImageService;
  /** Release the database connection */
  cleanup(): Promise<void>;
}

export class LocalDeployment implements Deployment {
  private constructor(
    private readonly dbService: DBService,
    private readonly storageService: StorageService,
    private readonly imageService: ImageService
  ) {}

  static async create(config: DeploymentConfig, logger: Logger = noopLogger): Promise<LocalDeployment> {
    const storage = new StorageService(config.uploadDir);
    await storage.ensureReady();
    logger.info({ root: storage.root }, 'Storage root ready');

    const db = await connect({ url: config.databaseUrl, maxConnections: config.databaseMaxConnections });
    try {
      const applied = await db.runMigrations();
      logger.info({ driver: db.driver, applied }, 'Database schema ready');
    } catch (err) {
      await db.close();
      throw err;
    }

    const images = new ImageService(storage, db, { orphanPolicy: config.orphanPolicy, logger });
    return new LocalDeployment(db, storage, images);
  }

  db(): DBService {
    return this.dbService;
  }

  storage(): StorageService {
    return this.storageService;
  }

  images(): ImageService {
    return this.imageService;
  }

  async cleanup(): Promise<void> {
    await this.dbService.close();
  }
}
