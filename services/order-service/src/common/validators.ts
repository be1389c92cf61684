import { ValidateBy, ValidationOptions } from "class-validator";

export function hasAtMostTwoDecimals(value: number): boolean {
  const text = String(value);
  if (text.includes("e")) return false;
  const fraction = text.split(".")[1] || "";
  return fraction.length <= 2;
}

function amountProblem(value: unknown, label: string, money: boolean): string | null {
  if (value === undefined || value === null) return `${label} is required`;
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) return `${label} must be greater than 0`;
  if (money && !hasAtMostTwoDecimals(value)) return `${label} must have at most 2 decimal places`;
  return null;
}

/**
 * A positive finite number. The message names the first rule broken, so each
 * field reports one violation. `money` also limits it to two decimal places.
 */
export function IsPositiveAmount(label: string, money = false, options?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: "isPositiveAmount",
      validator: {
        validate: (value: unknown) => amountProblem(value, label, money) === null,
        defaultMessage: (args) => amountProblem(args?.value, label, money) || `${label} is invalid`,
      },
    },
    options,
  );
}

/** A string with at least one non-whitespace character. */
export function IsFilled(message: string, options?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: "isFilled",
      validator: {
        validate: (value: unknown) => typeof value === "string" && value.trim().length > 0,
        defaultMessage: () => message,
      },
    },
    options,
  );
}
