import type { GetValue, TypeTag, ValidationResult, Validator } from '~/types';
import { VALID, failure, flatten } from '~/result';
import { hasOwn, isEqual, isObject, isValidValueType, stringLength, stringify } from '~/utils';

const MULTIPLE_OF_TOLERANCE = 1e-9;

export const defaultGetValue: GetValue = (obj, key) => {
  return hasOwn(obj, key) ? obj[key] : undefined;
};

export const validateType = (types: TypeTag[]): Validator => {
  const expected = types.length > 0 ? types.join(', ') : '(none)';

  return value => {
    if (types.some(type => isValidValueType(value, type))) {
      return VALID;
    }

    return failure(`Value must be of type: ${expected}`);
  };
};

export const validateEnum = (values: unknown[]): Validator => {
  return value => {
    if (values.some(v => isEqual(v, value))) {
      return VALID;
    }

    return failure(`Value must be one of: ${values.map(stringify).join(', ')}`);
  };
};

/**
 * String validators
 */

export const validateMaxLength = (maxLength: number): Validator => {
  return value => {
    if (typeof value !== 'string' || stringLength(value) <= maxLength) return VALID;
    return failure(`String length must be <= ${maxLength}`);
  };
};

export const validateMinLength = (minLength: number): Validator => {
  return value => {
    if (typeof value !== 'string' || stringLength(value) >= minLength) return VALID;
    return failure(`String length must be >= ${minLength}`);
  };
};

export const validatePattern = (pattern: string, regex: RegExp): Validator => {
  return value => {
    if (typeof value !== 'string' || regex.test(value)) return VALID;
    return failure(`String must match pattern: ${pattern}`);
  };
};

/**
 * Number validators
 */

export const validateMultipleOf = (multipleOf: number): Validator => {
  return value => {
    if (typeof value !== 'number') return VALID;

    const quotient = value / multipleOf;
    if (Math.abs(quotient - Math.round(quotient)) < MULTIPLE_OF_TOLERANCE) {
      return VALID;
    }

    return failure(`Value must be multiple of ${multipleOf}`);
  };
};

export const validateMinimum = (minimum: number, exclusive = false): Validator => {
  return value => {
    if (typeof value !== 'number') return VALID;

    if (exclusive) {
      return value > minimum ? VALID : failure(`Value must be > ${minimum}`);
    }

    return value >= minimum ? VALID : failure(`Value must be >= ${minimum}`);
  };
};

export const validateMaximum = (maximum: number, exclusive = false): Validator => {
  return value => {
    if (typeof value !== 'number') return VALID;

    if (exclusive) {
      return value < maximum ? VALID : failure(`Value must be < ${maximum}`);
    }

    return value <= maximum ? VALID : failure(`Value must be <= ${maximum}`);
  };
};

/**
 * Array validators
 */

export const validateMinItems = (minItems: number): Validator => {
  return value => {
    if (!Array.isArray(value) || value.length >= minItems) return VALID;
    return failure(`Array length must be >= ${minItems}`);
  };
};

export const validateMaxItems = (maxItems: number): Validator => {
  return value => {
    if (!Array.isArray(value) || value.length <= maxItems) return VALID;
    return failure(`Array length must be <= ${maxItems}`);
  };
};

export const validateUniqueItems: Validator = value => {
  if (!Array.isArray(value)) return VALID;

  const results: ValidationResult[] = [];

  for (let i = 1; i < value.length; i++) {
    const first = value.slice(0, i).findIndex(item => isEqual(item, value[i]));
    if (first !== -1) {
      results.push(failure(`Duplicate items not allowed (index ${i} equals index ${first})`));
    }
  }

  return flatten(results);
};

export const validateItems = (itemValidator: Validator): Validator => {
  return value => {
    if (!Array.isArray(value)) return VALID;
    return flatten(value.map(item => itemValidator(item)));
  };
};

/**
 * Positional validation. Elements past the end of `itemValidators` go to
 * `additionalItems`; `false` rejects each of them.
 */

export const validateTuple = (itemValidators: Validator[], additionalItems: Validator | false): Validator => {
  return value => {
    if (!Array.isArray(value)) return VALID;

    return flatten(value.map((item, index) => {
      const validator = index < itemValidators.length ? itemValidators[index] : additionalItems;

      if (validator === false) {
        return failure(`Additional item at index ${index} is not permitted in this array`);
      }

      return validator(item);
    }));
  };
};

/**
 * Object validators
 */

export const validateMaxProperties = (maxProperties: number): Validator => {
  return value => {
    if (!isObject(value) || Object.keys(value).length <= maxProperties) return VALID;
    return failure(`Object must have <= ${maxProperties} properties`);
  };
};

export const validateMinProperties = (minProperties: number): Validator => {
  return value => {
    if (!isObject(value) || Object.keys(value).length >= minProperties) return VALID;
    return failure(`Object must have >= ${minProperties} properties`);
  };
};

export const validateRequired = (required: string[], getValue: GetValue = defaultGetValue): Validator => {
  return value => {
    if (!isObject(value)) return VALID;

    return flatten(required.map(key => {
      return getValue(value, key) === undefined ? failure(`Missing required property: ${key}`) : VALID;
    }));
  };
};

export interface PropertyValidators {
  properties: Map<string, Validator>;
  patternProperties: Array<[RegExp, Validator]>;
  additionalProperties: Validator | false;
}

/**
 * Declared properties are looked up by name. Every key of the value is then
 * matched against each pattern, and keys claimed by neither a declared name
 * nor a pattern go to `additionalProperties`.
 */

export const validateProperties = (
  validators: PropertyValidators,
  getValue: GetValue = defaultGetValue
): Validator => {
  const { properties, patternProperties, additionalProperties } = validators;

  return value => {
    if (!isObject(value)) return VALID;

    const results: ValidationResult[] = [];

    for (const [key, validator] of properties) {
      const propValue = getValue(value, key);
      if (propValue !== undefined) {
        results.push(validator(propValue));
      }
    }

    for (const [key, propValue] of Object.entries(value)) {
      let matched = properties.has(key);

      for (const [regex, validator] of patternProperties) {
        if (regex.test(key)) {
          matched = true;
          results.push(validator(propValue));
        }
      }

      if (!matched) {
        results.push(additionalProperties === false
          ? failure(`Additional property '${key}' is not permitted in this object`)
          : additionalProperties(propValue));
      }
    }

    return flatten(results);
  };
};

/**
 * Dependency validators
 */

export const validateDependency = (key: string, validator: Validator, getValue: GetValue = defaultGetValue): Validator => {
  return value => {
    if (!isObject(value) || getValue(value, key) === undefined) return VALID;
    return validator(value);
  };
};

export const validateDependencies = (key: string, dependencies: string[], getValue: GetValue = defaultGetValue): Validator => {
  return value => {
    if (!isObject(value) || getValue(value, key) === undefined) return VALID;

    return flatten(dependencies.map(dependency => {
      if (getValue(value, dependency) === undefined) {
        return failure(`Property '${key}' is missing its dependency '${dependency}'`);
      }

      return VALID;
    }));
  };
};
