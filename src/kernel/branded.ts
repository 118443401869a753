type Brand<TBase, TBrand extends string> = TBase & { readonly __brand: TBrand };

/**
 * Identifier of an entity tagged with its owning collection. Only the registry builder mints
 * these, after the candidate load has validated.
 */
export type TypedId<TCollection extends string> = Brand<string, `TypedId:${TCollection}`>;

/** Dense zero-based position of an entity within one collection of one snapshot. */
export type EntityIndex<TCollection extends string> = Brand<number, `EntityIndex:${TCollection}`>;

export const asTypedId = <TCollection extends string>(_collection: TCollection, value: string): TypedId<TCollection> =>
  value as TypedId<TCollection>;

export const asEntityIndex = <TCollection extends string>(
  _collection: TCollection,
  value: number,
): EntityIndex<TCollection> => value as EntityIndex<TCollection>;

export const isEntityIndexInRange = (value: number, size: number): boolean =>
  Number.isSafeInteger(value) && value >= 0 && value < size;
