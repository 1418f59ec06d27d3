import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import {
  thresholdTests,
  valueTest,
  type Example,
  type LabeledExample,
  type Sample,
  type TestGenerator,
} from '@binary-id3/decision-tree'

/** Dataset bundled with the CLI, used when no path is given. */
export const SAMPLE_DATASET_PATH = fileURLToPath(
  new URL('../../data/sample-dataset.json', import.meta.url),
)

const featureValueSchema = z.union([z.boolean(), z.number(), z.string(), z.null()])
const labelSchema = z.union([z.string(), z.number(), z.boolean()])

export const datasetSchema = z.object({
  truthLabel: labelSchema,
  attributes: z.array(z.string().min(1)).min(1).optional(),
  thresholds: z.record(z.number()).optional(),
  examples: z
    .array(
      z.object({
        features: z.record(featureValueSchema),
        label: labelSchema,
      }),
    )
    .min(1, 'Dataset needs at least one example'),
})

export type Dataset = z.infer<typeof datasetSchema>
export type Label = z.infer<typeof labelSchema>
export type Features = Example<string>

/** Dataset could not be read, parsed or validated. */
export class DatasetError extends Error {
  constructor(
    public readonly source: string,
    message: string,
    public readonly issues: readonly z.ZodIssue[] = [],
  ) {
    super(message)
    this.name = 'DatasetError'
  }
}

/** Validate already-parsed JSON. */
export function parseDataset(raw: unknown, source: string): Dataset {
  const result = datasetSchema.safeParse(raw)
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new DatasetError(source, `Invalid dataset ${source}: ${detail}`, result.error.issues)
  }
  return result.data
}

export async function loadDataset(path: string): Promise<Dataset> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new DatasetError(path, `Cannot read dataset ${path}: ${reason}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new DatasetError(path, `Dataset ${path} is not valid JSON: ${reason}`)
  }

  return parseDataset(raw, path)
}

export function toSample(dataset: Dataset): Sample<Features, Label> {
  return dataset.examples.map(
    ({ features, label }): LabeledExample<Features, Label> => [features, label],
  )
}

/** Declared attributes, else the first example's keys in insertion order. */
export function attributesOf(dataset: Dataset): string[] {
  return dataset.attributes ?? Object.keys(dataset.examples[0]?.features ?? {})
}

/** Threshold tests where the dataset declares them, truthiness elsewhere. */
export function testGeneratorFor(dataset: Dataset): TestGenerator<string, Features> {
  const { thresholds } = dataset
  return thresholds ? thresholdTests(thresholds, valueTest) : valueTest
}

/** Render an attribute the way its test reads. */
export function describeAttribute(dataset: Dataset, attribute: string): string {
  const thresholds = dataset.thresholds ?? {}
  const threshold = Object.hasOwn(thresholds, attribute) ? thresholds[attribute] : undefined
  return threshold === undefined ? attribute : `${attribute} <= ${threshold}`
}
