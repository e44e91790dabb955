import { ConfigurationError, describeValueType } from '../errors/ConfigurationError.js';
import { isFieldType } from './FieldType.js';
import type { FieldType } from './FieldType.js';

/** A named, ordered set of fields describing one record shape. Field names are not required to be unique. */
export class ModelDefinition {
  readonly fields: readonly FieldType[];

  /**
   * @param fields field type instances, in record order
   * @throws ConfigurationError on the first element that is not a field type
   */
  constructor(
    readonly name: string,
    fields: readonly unknown[],
    readonly uid?: string,
  ) {
    const checked: FieldType[] = [];
    for (const [index, field] of fields.entries()) {
      if (!isFieldType(field)) {
        throw new ConfigurationError(
          `Model '${name}': non valid type ${describeValueType(field)} at field index ${String(index)}`,
        );
      }
      checked.push(field);
    }
    this.fields = Object.freeze(checked);
  }

  get fieldNames(): readonly string[] {
    return this.fields.map((f) => f.name);
  }

  /** First field with the given name. */
  field(name: string): FieldType | undefined {
    return this.fields.find((f) => f.name === name);
  }
}
