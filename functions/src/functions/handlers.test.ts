import { describe, expect, it } from 'vitest'
import { BillComparisonEngine } from '../core/billComparison'
import { ConversationContextManager, createMessage, emptyContext } from '../core/conversationContext'
import { AccessDeniedError, InvalidRequestError } from '../lib/errors'
import { ScopedBillStore } from '../stores/billStore'
import { UserInfoManager } from '../stores/userInfo'
import { fiveMonthHistory } from '../testing/fixtures'
import { InMemoryBillRepository, InMemoryConversationRepository, InMemoryProfileRepository } from '../testing/inMemory'
import { handleCompareBills, handleImportBill } from './bills'
import { handleGetConversation } from './getConversation'
import { handleGetProfile, handleUpdateProfile } from './profile'

function services() {
  const bills = new InMemoryBillRepository().addAccount('u42', 'Ana', 'ACC-42').seed('u42', fiveMonthHistory())
  const conversations = new InMemoryConversationRepository()
  const profiles = new UserInfoManager(new InMemoryProfileRepository())
  return {
    bills,
    conversations,
    profiles,
    contexts: new ConversationContextManager(conversations),
    scopeFor: (uid: string) => {
      const billStore = new ScopedBillStore(bills, uid)
      return { billStore, comparison: new BillComparisonEngine(billStore, { anomalyThreshold: 0.25 }) }
    },
  }
}

describe('callable handlers', () => {
  it('returns the caller\'s persisted conversation', async () => {
    const s = services()
    const at = new Date('2024-06-01T10:00:00.000Z')
    const base = emptyContext('u42', at)
    await s.contexts.persist(s.contexts.append(base, createMessage('user', 'hi', at)), base)

    const result = await handleGetConversation({}, 'u42', s)

    expect(result.messages.map(m => m.text)).toEqual(['hi'])
    expect(result.summary).toEqual({ userId: 'u42', messageCount: 1, turnCount: 1, lastMessageAt: '2024-06-01T10:00:00.000Z' })
    await expect(handleGetConversation({ userId: 'u7' }, 'u42', s)).rejects.toBeInstanceOf(AccessDeniedError)
  })

  it('loads and updates the caller\'s profile', async () => {
    const s = services()

    const created = await handleGetProfile(undefined, 'u42', s, 'Ana Pop')
    expect(created).toMatchObject({ userId: 'u42', displayName: 'Ana', accountReference: 'ACC-42' })

    const updated = await handleUpdateProfile({ accountReference: ' ACC-43 ' }, 'u42', s)
    expect(updated).toMatchObject({ displayName: 'Ana', accountReference: 'ACC-43' })

    await expect(handleUpdateProfile({}, 'u42', s)).rejects.toBeInstanceOf(InvalidRequestError)
    await expect(handleUpdateProfile({ displayName: 42 }, 'u42', s)).rejects.toThrow('displayName must be a string')
    await expect(handleUpdateProfile({ userId: 'u7', displayName: 'x' }, 'u42', s)).rejects.toBeInstanceOf(AccessDeniedError)
  })

  it('seeds a profile first created by an update from the billing account', async () => {
    const s = services()

    const updated = await handleUpdateProfile({ accountReference: 'ACC-99' }, 'u42', s)

    expect(updated).toMatchObject({ displayName: 'Ana', accountReference: 'ACC-99' })
    expect(await s.profiles.loadProfile('u42')).toMatchObject({ displayName: 'Ana', accountReference: 'ACC-99' })
  })

  it('falls back to the token name for a user without a billing account', async () => {
    const s = services()

    const created = await handleGetProfile(undefined, 'u9', s, 'Dan')

    expect(created).toMatchObject({ userId: 'u9', displayName: 'Dan', accountReference: '' })
    expect(await handleGetProfile(undefined, 'u9', s)).toMatchObject({ displayName: 'Dan' })
  })

  it('compares the caller\'s bills', async () => {
    const result = await handleCompareBills({}, 'u42', services())

    expect(result.billsCompared.map(b => b.billId)).toEqual(['b5', 'b4', 'b3', 'b2'])
  })

  it('imports a bill from invoice text', async () => {
    const s = services()

    const bill = await handleImportBill({ text: 'Data facturii: 05.07.2024\nTotal de plata 55,10 lei' }, 'u42', s)

    expect(bill).toMatchObject({ userId: 'u42', periodStart: '2024-06-01', periodEnd: '2024-06-30', amount: 55.1 })
    const compared = await handleCompareBills({}, 'u42', s)
    expect(compared.billsCompared[0].billId).toBe(bill.billId)
    await expect(handleImportBill({ text: '' }, 'u42', s)).rejects.toThrow('text is required')
    await expect(handleImportBill('text', 'u42', s)).rejects.toThrow('Request data must be an object')
  })
})
