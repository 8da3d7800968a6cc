import { Injectable } from '@nestjs/common';
import {
  ABSENT,
  ExistingKeySnapshot,
  Field,
  NamedEntity,
  NormalizedRow,
  ReferenceSnapshot,
  ResolvedCreateRow,
  ResolvedRow,
  ResolvedUpdateRow,
  RowError,
  present,
} from '../inventory/inventory.types';

/** Case-insensitive name → id maps built once per submission. */
export interface ReferenceLookup {
  locations: ReadonlyMap<string, string>;
  categories: ReadonlyMap<string, string>;
  suppliers: ReadonlyMap<string, string>;
  existingKeys: ExistingKeySnapshot;
  defaultLocationId: string | null;
}

export type ResolveOutcome =
  | { kind: 'resolved'; row: ResolvedRow }
  | { kind: 'error'; error: RowError };

type Located<T> = { ok: true; value: T } | { ok: false; message: string };

@Injectable()
export class ReferenceResolverService {
  /**
   * A default location that is not in the snapshot is dropped, so rows that
   * need it fail the same way as for a caller without one.
   */
  buildLookup(
    snapshot: ReferenceSnapshot,
    existingKeys: ExistingKeySnapshot,
    defaultLocationId: string | null,
  ): ReferenceLookup {
    const knownDefault = snapshot.locations.some((location) => location.id === defaultLocationId);

    return {
      locations: this.buildNameMap(snapshot.locations),
      categories: this.buildNameMap(snapshot.categories),
      suppliers: this.buildNameMap(snapshot.suppliers),
      existingKeys,
      defaultLocationId: knownDefault ? defaultLocationId : null,
    };
  }

  resolve(row: NormalizedRow, lookup: ReferenceLookup): ResolveOutcome {
    const existingId = lookup.existingKeys.get(row.sku);

    if (existingId === undefined) {
      const location = this.locate(row.locationName, lookup);
      return location.ok
        ? this.withReferences(row, lookup, { existingId: null, locationId: location.value })
        : this.reject(row, 'Location', location.message);
    }

    const location = this.locateExisting(row.locationName, lookup);
    return location.ok
      ? this.withReferences(row, lookup, { existingId, locationId: location.value })
      : this.reject(row, 'Location', location.message);
  }

  private withReferences(
    row: NormalizedRow,
    lookup: ReferenceLookup,
    target:
      | Pick<ResolvedCreateRow, 'existingId' | 'locationId'>
      | Pick<ResolvedUpdateRow, 'existingId' | 'locationId'>,
  ): ResolveOutcome {
    const category = this.resolveOptional(row.categoryName, lookup.categories);
    if (category == null) {
      return this.reject(row, 'Category', `Category '${this.nameOf(row.categoryName)}' not found`);
    }

    const supplier = this.resolveOptional(row.supplierName, lookup.suppliers);
    if (supplier == null) {
      return this.reject(row, 'Supplier', `Supplier '${this.nameOf(row.supplierName)}' not found`);
    }

    const { categoryName, locationName, supplierName, ...rest } = row;
    return {
      kind: 'resolved',
      row: { ...rest, categoryId: category, supplierId: supplier, ...target },
    };
  }

  /** The named location, else the caller's default. */
  private locate(requested: Field<string | null>, lookup: ReferenceLookup): Located<string> {
    if (requested.kind === 'present' && requested.value != null) {
      const locationId = lookup.locations.get(requested.value.toLowerCase());
      return locationId
        ? { ok: true, value: locationId }
        : { ok: false, message: `Location '${requested.value}' not found` };
    }

    if (!lookup.defaultLocationId) {
      return { ok: false, message: 'No location specified and user has no default location' };
    }

    return { ok: true, value: lookup.defaultLocationId };
  }

  private locateExisting(
    requested: Field<string | null>,
    lookup: ReferenceLookup,
  ): Located<Field<string>> {
    // Without a Location column an existing item keeps its location.
    if (requested.kind === 'absent') {
      return { ok: true, value: ABSENT };
    }

    const located = this.locate(requested, lookup);
    return located.ok ? { ok: true, value: present(located.value) } : located;
  }

  /** `null` means the name did not match. */
  private resolveOptional(
    requested: Field<string | null>,
    names: ReadonlyMap<string, string>,
  ): Field<string | null> | null {
    if (requested.kind === 'absent' || requested.value == null) {
      return requested;
    }

    const id = names.get(requested.value.toLowerCase());
    return id ? present(id) : null;
  }

  private nameOf(field: Field<string | null>): string {
    return field.kind === 'present' ? field.value ?? '' : '';
  }

  private reject(row: NormalizedRow, column: string, message: string): ResolveOutcome {
    return { kind: 'error', error: { row: row.rowNumber, column, message } };
  }

  private buildNameMap(entities: NamedEntity[]): Map<string, string> {
    const map = new Map<string, string>();
    entities.forEach((entity) => {
      const key = entity.name.trim().toLowerCase();
      if (!map.has(key)) {
        map.set(key, entity.id);
      }
    });

    return map;
  }
}
