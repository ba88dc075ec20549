import { describe, expect, it } from 'vitest'
import { extractPeriod, KeywordIntentClassifier } from './intentClassifier'

describe('KeywordIntentClassifier', () => {
  const classifier = new KeywordIntentClassifier()

  it.each([
    'Can you compare my last bills?',
    'Why did my bill increase?',
    'March vs April please',
    'De ce a crescut factura?',
    'Care e diferența față de luna trecută?',
  ])('classifies "%s" as a comparison query', utterance => {
    expect(classifier.classify(utterance)).toEqual({ kind: 'comparison' })
  })

  it('classifies other billing questions as general queries', () => {
    expect(classifier.classify('What is on my latest bill?')).toEqual({ kind: 'general' })
    expect(classifier.classify('Are there any improvs charges?')).toEqual({ kind: 'general' })
  })

  it('extracts a requested month for general queries', () => {
    expect(classifier.classify('What was my total in March 2024?')).toEqual({
      kind: 'general',
      period: { start: '2024-03-01', end: '2024-03-31' },
    })
  })

  it('accepts custom comparison terms', () => {
    const custom = new KeywordIntentClassifier(['side by side'])

    expect(custom.classify('show them side by side')).toEqual({ kind: 'comparison' })
    expect(custom.classify('compare them')).toEqual({ kind: 'general' })
  })
})

describe('extractPeriod', () => {
  it('reads ISO and abbreviated month names', () => {
    expect(extractPeriod('bill for 2024-02')).toEqual({ start: '2024-02-01', end: '2024-02-29' })
    expect(extractPeriod('Sept 2023 charges')).toEqual({ start: '2023-09-01', end: '2023-09-30' })
  })

  it('ignores text without a month and year', () => {
    expect(extractPeriod('my last bill')).toBeUndefined()
    expect(extractPeriod('in March')).toBeUndefined()
  })
})
