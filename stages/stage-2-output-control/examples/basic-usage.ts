/**
 * Stage 2 Output Control 基础用法：
 * 用 JSON Schema 构建结果校验器，演示接受 / 拒绝以及错误信息（这些错误会被回传给模型）。
 */

import {
  createSchemaValidator,
  refineValidator,
  type ValidationOutcome,
} from "../src/index.js";

function show<T>(label: string, outcome: ValidationOutcome<T>) {
  if (outcome.accepted) {
    console.log(`${label} -> accepted:`, outcome.value);
  } else {
    console.log(`${label} -> rejected:`, outcome.errors);
  }
}

function main() {
  const integer = createSchemaValidator<number>({ type: "integer" });
  show('"4"', integer.validate("4"));
  show('"not a number"', integer.validate("not a number"));

  const city = refineValidator(
    createSchemaValidator<{ city: string; temp: number }>({
      type: "object",
      properties: {
        city: { type: "string" },
        temp: { type: "number" },
      },
      required: ["city", "temp"],
      additionalProperties: false,
    }),
    (value) => (value.temp < -90 ? "temp is below any recorded value" : undefined)
  );
  show("fenced object", city.validate('```json\n{"city":"Oslo","temp":4}\n```'));
  show("missing temp", city.validate('{"city":"Oslo"}'));
  show("refined", city.validate('{"city":"Oslo","temp":-120}'));
}

main();
