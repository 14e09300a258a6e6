/**
 * @picstore/deployment
 *
 * Contract through which the HTTP layer reaches the services of a running
 * picstore instance.
 */

import type { DBService } from '@picstore/db';
import type { ConfigService, EventsService, PictureService } from '@picstore/services';

export interface Deployment {
  /** Open the database and prepare storage directories */
  initialize(): Promise<void>;

  db(): DBService;

  config(): ConfigService;

  events(): EventsService;

  pictures(): PictureService;

  /** Release resources (closes the database) */
  cleanup(): Promise<void>;
}

export type { DBService, ConfigService, EventsService, PictureService };
