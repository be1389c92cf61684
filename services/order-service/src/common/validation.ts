import { ValidationPipe } from "@nestjs/common";
import { ClassConstructor, plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import { FieldViolation, ValidationError } from "./errors";

/** The part of a class-validator error that the flattening reads. */
export interface ConstraintFailure {
  property: string;
  constraints?: Record<string, string>;
  children?: ConstraintFailure[];
}

/** Flattens nested class-validator errors into dotted field paths such as `order.items.0.price`. */
export function flattenValidationErrors(errors: readonly ConstraintFailure[], parentPath = ""): FieldViolation[] {
  const violations: FieldViolation[] = [];
  for (const error of errors) {
    const field = parentPath ? `${parentPath}.${error.property}` : error.property;
    for (const message of Object.values(error.constraints || {})) {
      violations.push({ field, message });
    }
    if (error.children && error.children.length > 0) {
      violations.push(...flattenValidationErrors(error.children, field));
    }
  }
  return violations;
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    whitelist: true,
    forbidNonWhitelisted: true,
    exceptionFactory: (errors) => {
      const details = flattenValidationErrors(errors);
      return new ValidationError(details[0]?.message || "Invalid request", details);
    },
  });
}

/** Runs the DTO's rules outside the HTTP pipe, reporting paths under `parentPath`. */
export function assertValidPayload<T extends object>(dto: ClassConstructor<T>, payload: object, parentPath = ""): void {
  const violations = flattenValidationErrors(validateSync(plainToInstance(dto, payload)), parentPath);
  if (violations.length > 0) throw new ValidationError(violations[0].message, violations);
}
