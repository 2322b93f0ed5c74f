/**
 * Resource and unit lookups on the remote platform.
 *
 * @packageDocumentation
 */

import {
  expectShape,
  validateCreateItemResponse,
  validateSearchItemsResponse,
  type RemoteItem,
} from './schemas.js';
import type { RemoteSession, SessionFactory } from './session.js';

/** Data flag requesting an item's base properties. */
export const BASE_DATA_FLAG = 0x1;

/** Item types searched by the unit directory. */
export type RemoteItemType = 'avl_resource' | 'avl_unit' | 'avl_unit_group';

/**
 * Searches items of one type whose system name matches a mask.
 *
 * @param session - Open session.
 * @param itemsType - Item type.
 * @param nameMask - Name mask; `*` matches everything.
 */
export async function searchItems(
  session: RemoteSession,
  itemsType: RemoteItemType,
  nameMask: string
): Promise<RemoteItem[]> {
  const body = await session.call('core/search_items', {
    spec: {
      itemsType,
      propName: 'sys_name',
      propValueMask: nameMask,
      sortType: 'sys_name',
      propType: 'property',
    },
    force: 0,
    flags: BASE_DATA_FLAG,
    from: 0,
    to: 0,
  });
  return expectShape('core/search_items', body, validateSearchItemsResponse).items;
}

/**
 * Returns the id of the resource named `resourceName`, creating it when no
 * single resource of that name exists.
 *
 * @param session - Open session; the resource is created for its user.
 * @param resourceName - Resource name.
 */
export async function ensureNotificationResource(
  session: RemoteSession,
  resourceName: string
): Promise<number> {
  const matches = await searchItems(session, 'avl_resource', resourceName);
  const [only] = matches;
  if (matches.length === 1 && only !== undefined) {
    return only.id;
  }

  const body = await session.call('core/create_resource', {
    creatorId: session.userId,
    name: resourceName,
    dataFlags: BASE_DATA_FLAG,
    skipCreatorCheck: 1,
  });
  return expectShape('core/create_resource', body, validateCreateItemResponse).item.id;
}

/**
 * An entry of the unit directory.
 */
export interface DirectoryItem {
  readonly id: number;
  readonly name: string;
  readonly kind: 'resource' | 'unit' | 'unit-group';
}

/**
 * Source of the resources and units a customer may select.
 */
export interface UnitDirectory {
  /**
   * Lists resources that can hold the customer's notifications.
   *
   * @param customerId - The customer.
   */
  listResources(customerId: number): Promise<readonly DirectoryItem[]>;

  /**
   * Lists units and unit groups selectable for a resource.
   *
   * @param customerId - The customer.
   * @param resourceId - The selected resource.
   */
  listUnits(customerId: number, resourceId: number): Promise<readonly DirectoryItem[]>;
}

/**
 * Unit directory backed by the platform. Item visibility follows the access
 * rights of the customer's token.
 */
export class RemoteUnitDirectory implements UnitDirectory {
  private readonly sessions: SessionFactory;

  /**
   * Creates a new RemoteUnitDirectory.
   *
   * @param sessions - Opens sessions with the customer's token.
   */
  constructor(sessions: SessionFactory) {
    this.sessions = sessions;
  }

  async listResources(customerId: number): Promise<readonly DirectoryItem[]> {
    return this.sessions.run(customerId, async (session) => {
      const resources = await searchItems(session, 'avl_resource', '*');
      return resources.map((item) => ({ id: item.id, name: item.nm, kind: 'resource' as const }));
    });
  }

  async listUnits(customerId: number, resourceId: number): Promise<readonly DirectoryItem[]> {
    return this.sessions.run(customerId, async (session) => {
      const resources = await searchItems(session, 'avl_resource', '*');
      if (!resources.some((resource) => resource.id === resourceId)) {
        return [];
      }
      const units = await searchItems(session, 'avl_unit', '*');
      const groups = await searchItems(session, 'avl_unit_group', '*');
      return [
        ...units.map((item) => ({ id: item.id, name: item.nm, kind: 'unit' as const })),
        ...groups.map((item) => ({ id: item.id, name: item.nm, kind: 'unit-group' as const })),
      ];
    });
  }
}

/**
 * Unit directory over fixed data.
 */
export class StaticUnitDirectory implements UnitDirectory {
  private readonly resources: readonly DirectoryItem[];
  private readonly units: ReadonlyMap<number, readonly DirectoryItem[]>;

  /**
   * Creates a directory from fixed data shared by every customer.
   *
   * @param resources - Available resources.
   * @param units - Selectable units and groups by resource id.
   */
  constructor(resources: readonly DirectoryItem[], units: ReadonlyMap<number, readonly DirectoryItem[]>) {
    this.resources = resources;
    this.units = units;
  }

  async listResources(): Promise<readonly DirectoryItem[]> {
    return this.resources;
  }

  async listUnits(_customerId: number, resourceId: number): Promise<readonly DirectoryItem[]> {
    return this.units.get(resourceId) ?? [];
  }
}
