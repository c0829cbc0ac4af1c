/**
 * Command: rubric rules
 */
import { ruleRegistry } from "@rubric/rules";

export async function rulesCmd(_args: string[]): Promise<void> {
  console.log("Registered rule types:");
  for (const name of ruleRegistry.list()) console.log(`  ${name}`);
}
