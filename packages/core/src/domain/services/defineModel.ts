import { ModelDefinition } from '../model/ModelDefinition.js';
import type { FieldDescriptor } from '../model/FieldType.js';
import { fieldTypes } from './FieldTypeRegistry.js';
import type { FieldTypeRegistry } from './FieldTypeRegistry.js';

export interface DefineModelOptions {
  readonly uid?: string;
  /** Registry used to resolve type tags. Default: the built-in `fieldTypes`. */
  readonly registry?: FieldTypeRegistry;
}

/** Build a model definition from plain field descriptors. */
export function defineModel(
  name: string,
  descriptors: readonly FieldDescriptor[],
  options: DefineModelOptions = {},
): ModelDefinition {
  const registry = options.registry ?? fieldTypes;
  return new ModelDefinition(
    name,
    descriptors.map((d) => registry.create(d)),
    options.uid,
  );
}
