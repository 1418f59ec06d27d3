import {
  accuracy,
  buildTree,
  countLeaves,
  countNodes,
  formatTree,
  isDecisionTreeError,
  predict,
  treeDepth,
} from '@binary-id3/decision-tree'
import { resolveTrainingConfig, toBuildOptions } from '@binary-id3/config'
import {
  attributesOf,
  describeAttribute,
  loadDataset,
  SAMPLE_DATASET_PATH,
  testGeneratorFor,
  toSample,
} from './lib/dataset.js'
import { createLogger, inductionLogger, type LineWriter, type Logger } from './lib/logger.js'

export interface CliIo {
  stdout: LineWriter
  stderr: LineWriter
  now?: () => Date
}

/**
 * Train on a dataset and print the tree, one prediction per example and a
 * summary line. Resolves to the process exit code; never rejects.
 *
 * Dataset path: first argument, then ID3_DATASET, then the bundled sample.
 */
export async function run(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>>,
  io: CliIo,
): Promise<number> {
  let logger: Logger = createLogger('info', { write: io.stderr, now: io.now })

  try {
    const config = resolveTrainingConfig(env)
    logger = createLogger(config.logLevel, { write: io.stderr, now: io.now })

    const path = argv[0] ?? config.datasetPath ?? SAMPLE_DATASET_PATH
    const dataset = await loadDataset(path)
    const sample = toSample(dataset)
    const attributes = attributesOf(dataset)
    logger.info('dataset loaded', { path, examples: sample.length, attributes })

    const labels = [...new Set(sample.map(([, label]) => label))]
    if (labels.length > 2) {
      logger.warn('more than two labels; every label other than the truth label counts as negative', {
        labels,
        truthLabel: dataset.truthLabel,
      })
    }

    const tree = buildTree(
      sample,
      attributes,
      testGeneratorFor(dataset),
      dataset.truthLabel,
      toBuildOptions(config, inductionLogger<string>(logger)),
    )
    logger.info('tree built', { depth: treeDepth(tree), nodes: countNodes(tree) })

    io.stdout(formatTree(tree, (attr) => describeAttribute(dataset, attr)) + '\n')
    for (const [features, label] of sample) {
      io.stdout(JSON.stringify({ features, label, prediction: predict(tree, features) }) + '\n')
    }
    io.stdout(
      JSON.stringify({
        examples: sample.length,
        accuracy: accuracy(tree, sample, dataset.truthLabel),
        depth: treeDepth(tree),
        nodes: countNodes(tree),
        leaves: countLeaves(tree),
      }) + '\n',
    )
    return 0
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error.message, {
        error: error.name,
        code: isDecisionTreeError(error) ? error.code : undefined,
      })
    } else {
      logger.error(String(error))
    }
    return 1
  }
}
