import { ValidationErrors } from './validation.errors';

export interface Validateable {
    validate(errors: ValidationErrors): void;
}

export function isValid(subject: Validateable, errors: ValidationErrors = new ValidationErrors()): boolean {
    errors.clear();
    subject.validate(errors);
    return errors.isEmpty();
}
