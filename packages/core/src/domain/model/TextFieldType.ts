import { FieldType } from './FieldType.js';
import type { BaseConstraints, FieldConstraints, FieldSettings } from './FieldType.js';

export type TextConstraints = BaseConstraints;

/** Free text. Non-string values are coerced with `String()`, so only the nullability check can fail. */
export class TextFieldType extends FieldType<string> {
  static readonly TYPE_TAG = 'text';
  readonly type = TextFieldType.TYPE_TAG;

  protected ingestConstraints(constraints: FieldConstraints): FieldSettings {
    return this.ingestBaseConstraints(constraints);
  }

  protected coerce(value: NonNullable<unknown>): string {
    return typeof value === 'string' ? value : String(value);
  }
}

export function textField(name: string, constraints?: TextConstraints, uid?: string): TextFieldType {
  return new TextFieldType(name, constraints, uid);
}
