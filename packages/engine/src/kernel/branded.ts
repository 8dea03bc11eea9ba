type Brand<TBase, TBrand extends string> = TBase & { readonly __brand: TBrand };

export type EntityId = Brand<string, 'EntityId'>;
export type ClassName = Brand<string, 'ClassName'>;
export type VerbInstanceId = Brand<string, 'VerbInstanceId'>;

export const asEntityId = (value: string): EntityId => value as EntityId;
export const asClassName = (value: string): ClassName => value as ClassName;
export const asVerbInstanceId = (value: string): VerbInstanceId => value as VerbInstanceId;
