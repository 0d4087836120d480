/**
 * Base Repository Interface
 *
 * The Repository pattern keeps Drizzle queries, blob bookkeeping and
 * row-to-model mapping out of the route handlers, which only ever see domain
 * models and domain errors.
 */

/**
 * Generic repository interface defining standard CRUD operations.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - Input accepted when creating an entity
 * @typeParam UpdateInput - Input accepted when updating an entity
 * @typeParam Id - Identifier type
 */
export interface Repository<T, CreateInput, UpdateInput, Id = number> {
  /**
   * Retrieves an entity by its unique identifier.
   *
   * @returns The domain model if found, or null if not found
   */
  findById(id: Id): Promise<T | null>;

  /**
   * Retrieves an entity that must exist.
   *
   * @throws NotFoundError if no entity has the given id
   */
  get(id: Id): Promise<T>;

  /**
   * Retrieves all entities of this type in the repository's natural order.
   */
  findAll(): Promise<T[]>;

  /**
   * Creates a new entity and persists it.
   *
   * @returns The created domain model with generated id and timestamps
   */
  create(input: CreateInput): Promise<T>;

  /**
   * Updates an existing entity.
   *
   * @throws NotFoundError if no entity has the given id
   */
  update(id: Id, input: UpdateInput): Promise<T>;

  /**
   * Permanently deletes an entity.
   *
   * @throws NotFoundError if no entity has the given id
   */
  delete(id: Id): Promise<void>;
}

/**
 * Source of the current time. Injected so tests can control timestamps.
 */
export type Clock = () => Date;

/**
 * Options shared by all repositories.
 */
export interface RepositoryOptions {
  /** Defaults to the system clock */
  clock?: Clock;
}

export const systemClock: Clock = () => new Date();
