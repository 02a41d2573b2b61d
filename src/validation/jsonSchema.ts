import Ajv, { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import runReportSchema from "../../contracts/schemas/run_report.schema.json";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

let runReportValidator: ValidateFunction | null = null;

export function getRunReportValidator(): ValidateFunction {
  if (!runReportValidator) {
    runReportValidator = ajv.compile(runReportSchema);
  }
  return runReportValidator;
}

export function assertValidSchema(
  validator: ValidateFunction,
  data: unknown,
  label: string
): void {
  const valid = validator(data);
  if (valid) return;
  const errors = (validator.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message}`)
    .join("; ");
  throw new Error(`${label} failed schema validation: ${errors}`);
}
