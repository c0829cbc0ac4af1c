/**
 * Command: rubric create-template
 *
 * Writes a starter template with two rules to edit.
 */
import { Effect } from "effect";
import { parseLogLevel, runLogged } from "@rubric/effect-runtime";
import { ruleRegistry } from "@rubric/rules";
import { Template, writeTemplateFile } from "@rubric/scoring";
import { parseKV, requireArg, strArg } from "../parse.js";

export function starterTemplate(name: string, description: string): Template {
  return new Template({
    name,
    description,
    rules: [
      ruleRegistry.construct("contains_phrase", 1.0, { phrase: "example" }),
      ruleRegistry.construct("word_count", 1.0, { min_words: 5, max_words: 100 }),
    ],
  });
}

export async function createTemplateCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const name = requireArg(kv, "name", "template name");
  const out = strArg(kv, "out", `templates/${name.toLowerCase().replace(/[^a-z0-9]+/g, "-")}.yaml`);
  const description = strArg(kv, "description", `Template for ${name}`);

  const template = starterTemplate(name, description);
  await runLogged(
    writeTemplateFile(out, template).pipe(Effect.tap(() => Effect.logInfo(`Template written to ${out}`))),
    parseLogLevel(kv["log"] ?? process.env.RUBRIC_LOG_LEVEL),
  );
}
