import type { ValidationResult, Validator } from '~/types';
import { VALID, failure, flatten } from '~/result';

export const valid: Validator = () => VALID;

export const invalid = (message: string): Validator => {
  return () => failure(message);
};

export const allOf = (validators: Validator[]): Validator => {
  return value => flatten(validators.map(validator => validator(value)));
};

export const anyOf = (validators: Validator[]): Validator => {
  return value => {
    const results: ValidationResult[] = [];

    for (const validator of validators) {
      const result = validator(value);
      if (result.valid) {
        return VALID;
      }

      results.push(result);
    }

    const result = flatten(results);
    return result.valid ? failure('Value must match at least one schema in anyOf') : result;
  };
};

export const oneOf = (validators: Validator[]): Validator => {
  return value => {
    const results = validators.map(validator => validator(value));
    const matched = results.filter(result => result.valid).length;

    if (matched === 1) {
      return VALID;
    }

    if (matched > 1) {
      return failure(`Value matches more than one schema in oneOf (matched ${matched})`);
    }

    return flatten([failure('Value must match exactly one schema in oneOf'), ...results]);
  };
};

export const not = (validator: Validator): Validator => {
  return value => {
    return validator(value).valid ? failure('Value must not match the schema in not') : VALID;
  };
};
