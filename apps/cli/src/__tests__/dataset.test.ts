import { describe, it, expect } from 'vitest'
import { buildTree, predict } from '@binary-id3/decision-tree'
import {
  attributesOf,
  DatasetError,
  describeAttribute,
  loadDataset,
  parseDataset,
  SAMPLE_DATASET_PATH,
  testGeneratorFor,
  toSample,
} from '../lib/dataset.js'

const weather = {
  truthLabel: 'warm',
  thresholds: { temp: 20 },
  examples: [
    { features: { temp: 15, sunny: true }, label: 'cold' },
    { features: { temp: 25, sunny: false }, label: 'warm' },
  ],
}

describe('parseDataset', () => {
  it('accepts a well-formed dataset', () => {
    const dataset = parseDataset(weather, 'inline')
    expect(dataset.truthLabel).toBe('warm')
    expect(dataset.examples).toHaveLength(2)
  })

  it('rejects a dataset without examples', () => {
    expect(() => parseDataset({ truthLabel: 1, examples: [] }, 'inline')).toThrow(
      'Invalid dataset inline: examples: Dataset needs at least one example',
    )
  })

  it('rejects a missing truth label and keeps the zod issues', () => {
    try {
      parseDataset({ examples: [{ features: {}, label: 1 }] }, 'inline')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(DatasetError)
      if (error instanceof DatasetError) {
        expect(error.source).toBe('inline')
        expect(error.issues.map((issue) => issue.path.join('.'))).toEqual(['truthLabel'])
      }
    }
  })

  it('rejects non-scalar feature values', () => {
    const raw = { truthLabel: 1, examples: [{ features: { tags: ['a'] }, label: 1 }] }
    expect(() => parseDataset(raw, 'inline')).toThrow(DatasetError)
  })
})

describe('dataset helpers', () => {
  const dataset = parseDataset(weather, 'inline')

  it('turns examples into (features, label) pairs', () => {
    expect(toSample(dataset)).toEqual([
      [{ temp: 15, sunny: true }, 'cold'],
      [{ temp: 25, sunny: false }, 'warm'],
    ])
  })

  it('defaults attributes to the first example keys', () => {
    expect(attributesOf(dataset)).toEqual(['temp', 'sunny'])
  })

  it('prefers declared attributes', () => {
    expect(attributesOf({ ...dataset, attributes: ['sunny'] })).toEqual(['sunny'])
  })

  it('uses thresholds where declared and truthiness elsewhere', () => {
    const generate = testGeneratorFor(dataset)
    expect(generate('temp')({ temp: 20 })).toBe(true)
    expect(generate('temp')({ temp: 21 })).toBe(false)
    expect(generate('sunny')({ sunny: true })).toBe(true)
  })

  it('describes threshold attributes by their test', () => {
    expect(describeAttribute(dataset, 'temp')).toBe('temp <= 20')
    expect(describeAttribute(dataset, 'sunny')).toBe('sunny')
  })

  it('trains a tree that splits on the threshold', () => {
    const tree = buildTree(toSample(dataset), attributesOf(dataset), testGeneratorFor(dataset), 'warm')
    expect(tree.attr).toBe('temp')
    expect(predict(tree, { temp: 30, sunny: true })).toBe(true)
    expect(predict(tree, { temp: 5, sunny: false })).toBe(false)
  })
})

describe('loadDataset', () => {
  it('loads the bundled sample', async () => {
    const dataset = await loadDataset(SAMPLE_DATASET_PATH)
    expect(dataset.truthLabel).toBe('water')
    expect(dataset.examples).toHaveLength(12)
  })

  it('reports an unreadable file as a DatasetError', async () => {
    await expect(loadDataset('/nonexistent/dataset.json')).rejects.toThrow(
      'Cannot read dataset /nonexistent/dataset.json: ',
    )
  })
})
