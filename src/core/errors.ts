/**
 * Error kinds raised by the actor pipeline.
 *
 * Both are content bugs rather than transient conditions: they abort the
 * single spawn or clip build that raised them and are never retried.
 */

export class GameError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or missing spawn descriptor (entity type, entities layer). */
export class ConfigError extends GameError {}

/** Atlas key with no matching regions. */
export class AssetError extends GameError {}
