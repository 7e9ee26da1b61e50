/**
 * CabinetItemsRepository
 *
 * Ingredients the user keeps at home. At most one live item per ingredient.
 */

import type { CabinetItem } from '@/lib/types';
import type { TableConfig } from '../datasources/types';
import { cabinetItemSchema } from '../schemas';
import { formatTimestamp } from '../timestamps';
import { SYNC_TABLES } from '../types';
import { BaseRepository, type RepositoryDeps } from './BaseRepository';

export const USER_CABINETS_TABLE: TableConfig<CabinetItem> = {
  tableName: SYNC_TABLES.USER_CABINETS,
  columns: [
    'id',
    'user_id',
    'ingredient_id',
    'is_staple',
    'added_at',
    'last_used_at',
    'created_at',
    'updated_at',
    'deleted_at',
  ],
  booleanColumns: ['is_staple'],
  timestampColumns: ['added_at', 'last_used_at'],
  naturalKey: ['ingredient_id'],
  schema: cabinetItemSchema,
};

export class CabinetItemsRepository extends BaseRepository<CabinetItem> {
  constructor(deps: RepositoryDeps) {
    super(deps, USER_CABINETS_TABLE);
  }

  async getByIngredient(ingredientId: string): Promise<CabinetItem | null> {
    const items = await this.queryOwned('ingredient_id = $1', [ingredientId]);
    return items[0] ?? null;
  }

  async getStaples(): Promise<CabinetItem[]> {
    return this.queryOwned('is_staple = $1', [true], 'added_at ASC');
  }

  /**
   * Add an ingredient. Adding one that is already in the cabinet only updates
   * its staple flag.
   */
  async addIngredient(ingredientId: string, isStaple: boolean = false): Promise<CabinetItem> {
    const existing = await this.getByIngredient(ingredientId);
    if (existing) {
      if (existing.is_staple === isStaple) return existing;
      return (await this.update(existing.id, { is_staple: isStaple })) ?? existing;
    }

    return this.create({
      ingredient_id: ingredientId,
      is_staple: isStaple,
      added_at: formatTimestamp(this.clock()),
      last_used_at: null,
    });
  }

  async markUsed(ingredientId: string): Promise<CabinetItem | null> {
    const existing = await this.getByIngredient(ingredientId);
    if (!existing) return null;

    return this.update(existing.id, { last_used_at: formatTimestamp(this.clock()) });
  }

  async removeIngredient(ingredientId: string): Promise<boolean> {
    const existing = await this.getByIngredient(ingredientId);
    if (!existing) return false;

    return this.delete(existing.id);
  }
}
