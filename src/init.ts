import { writeFileSync, existsSync } from "fs";
import { join } from "path";
import * as p from "@clack/prompts";
import pc from "picocolors";
import { z } from "zod";
import { RC_FILE } from "./config.js";
import { DEFAULT_MODEL, MODELS, type ModelCapabilities } from "./engines/models.js";

const InitAnswersSchema = z.object({
  model: z.string(),
  reasoningEffort: z.enum(["none", "low", "medium", "high"]),
  verbosity: z.enum(["low", "medium", "high"]),
  choices: z.coerce.number().int().min(1).max(9),
});

export type InitAnswers = z.infer<typeof InitAnswersSchema>;

function capabilitiesFor(model: unknown): ModelCapabilities {
  return typeof model === "string" && model in MODELS ? MODELS[model] : MODELS[DEFAULT_MODEL];
}

/** The rc file body; models that return one completion get `choices: 1`. */
export function renderRcFile(answers: InitAnswers): string {
  const choices = capabilitiesFor(answers.model).multipleChoices ? answers.choices : 1;
  return JSON.stringify({ ...answers, choices }, null, 2) + "\n";
}

export async function runInit(cwd: string = process.cwd()): Promise<void> {
  p.intro(pc.bgCyan(pc.black(" draftcommit init ")));

  const configPath = join(cwd, RC_FILE);

  if (existsSync(configPath)) {
    const shouldOverwrite = await p.confirm({
      message: `${RC_FILE} already exists. Overwrite?`,
      initialValue: false,
    });

    if (p.isCancel(shouldOverwrite) || !shouldOverwrite) {
      p.outro(pc.yellow("Operation cancelled"));
      return;
    }
  }

  const answers = await p.group(
    {
      model: () =>
        p.select({
          message: "Select a model:",
          options: Object.entries(MODELS).map(([name, capabilities]) => ({
            value: name,
            label: name,
            hint: `${capabilities.contextSize / 1000}k context${capabilities.multipleChoices ? "" : ", one message per request"}`,
          })),
          initialValue: DEFAULT_MODEL,
        }),
      reasoningEffort: ({ results }) =>
        p.select<{ value: string }[], string>({
          message: "Reasoning effort:",
          options: capabilitiesFor(results.model).reasoningEfforts.map((effort): { value: string } => ({ value: effort })),
        }),
      verbosity: ({ results }) =>
        p.select<{ value: string }[], string>({
          message: "Verbosity:",
          options: capabilitiesFor(results.model).verbosities.map((verbosity): { value: string } => ({ value: verbosity })),
        }),
      choices: () =>
        p.text({
          message: "Messages to generate per run:",
          initialValue: "3",
          validate: (value) => {
            const n = Number(value);
            if (!Number.isInteger(n) || n < 1 || n > 9) return "Please enter a number from 1 to 9";
          },
        }),
    },
    {
      onCancel: () => {
        p.outro(pc.yellow("Operation cancelled"));
        process.exit(0);
      },
    }
  );

  const content = renderRcFile(InitAnswersSchema.parse(answers));
  writeFileSync(configPath, content);

  p.note(content.trim(), `Generated ${RC_FILE}`);
  p.outro(pc.green("Configuration initialized successfully!"));
}
