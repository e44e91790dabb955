import { ConfigurationError } from '../errors/ConfigurationError.js';
import type { FieldDescriptor, FieldType, FieldTypeClass } from '../model/FieldType.js';
import { TextFieldType } from '../model/TextFieldType.js';
import { NumberFieldType } from '../model/NumberFieldType.js';
import { DateFieldType } from '../model/DateFieldType.js';
import { EnumFieldType } from '../model/EnumFieldType.js';

/** Maps type tags to field type variants. New variants are added with `register()`. */
export class FieldTypeRegistry {
  private readonly types = new Map<string, FieldTypeClass>();

  constructor(variants: readonly FieldTypeClass[] = []) {
    for (const variant of variants) {
      this.register(variant);
    }
  }

  /** @throws ConfigurationError when another variant already owns the tag */
  register(variant: FieldTypeClass): this {
    const existing = this.types.get(variant.TYPE_TAG);
    if (existing) {
      throw new ConfigurationError(`Type '${variant.TYPE_TAG}' is already registered by ${existing.name}`);
    }
    this.types.set(variant.TYPE_TAG, variant);
    return this;
  }

  /** All registered variants, in registration order. */
  listTypes(): readonly FieldTypeClass[] {
    return [...this.types.values()];
  }

  /** The variant registered under `tag`, or `undefined`. */
  typeClass(tag: string): FieldTypeClass | undefined {
    return this.types.get(tag);
  }

  has(tag: string): boolean {
    return this.types.has(tag);
  }

  tags(): readonly string[] {
    return [...this.types.keys()];
  }

  /**
   * Build a field from a plain descriptor.
   *
   * @throws ConfigurationError for an unregistered type tag
   * @throws ConstraintError when the variant rejects the constraints
   */
  create(descriptor: FieldDescriptor): FieldType {
    const variant = this.typeClass(descriptor.type);
    if (!variant) {
      throw new ConfigurationError(`Unknown field type '${descriptor.type}' for field '${descriptor.name}'`);
    }
    return new variant(descriptor.name, descriptor.constraints, descriptor.uid);
  }
}

export const BUILTIN_TYPES: readonly FieldTypeClass[] = [TextFieldType, NumberFieldType, DateFieldType, EnumFieldType];

export function createDefaultRegistry(): FieldTypeRegistry {
  return new FieldTypeRegistry(BUILTIN_TYPES);
}

/** Process-wide registry holding the built-in variants. */
export const fieldTypes = createDefaultRegistry();
