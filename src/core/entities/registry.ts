import type { Logger } from "../../lib/logger.js";
import { createSilentLogger } from "../../lib/logger.js";
import type { EntityInfo } from "../types/domain.js";
import type { RegisteredEntity } from "./types.js";

export interface EntityDiscovery {
  list(): EntityInfo[];
  get(entityId: string): EntityInfo | undefined;
  getRunnable(entityId: string): RegisteredEntity | undefined;
  register(entity: RegisteredEntity): void;
  remove(entityId: string): Promise<boolean>;
  closeAll(): Promise<number>;
}

export class InMemoryEntityRegistry implements EntityDiscovery {
  private readonly entitiesById = new Map<string, RegisteredEntity>();

  constructor(
    entities: RegisteredEntity[] = [],
    private readonly logger: Logger = createSilentLogger()
  ) {
    for (const entity of entities) {
      this.register(entity);
    }
  }

  list(): EntityInfo[] {
    return [...this.entitiesById.values()].map((entity) => entity.info);
  }

  get(entityId: string): EntityInfo | undefined {
    return this.entitiesById.get(entityId)?.info;
  }

  getRunnable(entityId: string): RegisteredEntity | undefined {
    return this.entitiesById.get(entityId);
  }

  register(entity: RegisteredEntity): void {
    if (this.entitiesById.has(entity.info.id)) {
      this.logger.warn({ entityId: entity.info.id }, "Replacing registered entity");
    }
    this.entitiesById.set(entity.info.id, entity);
    this.logger.info({ entityId: entity.info.id, type: entity.info.type }, "Registered entity");
  }

  async remove(entityId: string): Promise<boolean> {
    const entity = this.entitiesById.get(entityId);
    if (!entity) {
      return false;
    }
    this.entitiesById.delete(entityId);
    await this.closeEntity(entity);
    return true;
  }

  /** Close every entity; returns how many closed cleanly. */
  async closeAll(): Promise<number> {
    let closed = 0;
    for (const entity of this.entitiesById.values()) {
      if (await this.closeEntity(entity)) {
        closed += 1;
      }
    }
    return closed;
  }

  private async closeEntity(entity: RegisteredEntity): Promise<boolean> {
    if (!entity.close) {
      return false;
    }
    try {
      await entity.close();
      this.logger.debug({ entityId: entity.info.id }, "Closed entity");
      return true;
    } catch (error) {
      this.logger.warn({ entityId: entity.info.id, err: error }, "Error closing entity");
      return false;
    }
  }
}
