import { describe, expect, it } from 'vitest'
import { PersistenceError } from '../lib/errors'
import { InMemoryProfileRepository } from '../testing/inMemory'
import { UserInfoManager } from './userInfo'

const fixedNow = () => new Date('2024-06-01T10:00:00.000Z')

describe('UserInfoManager', () => {
  it('creates a default profile on first load, once', async () => {
    const repository = new InMemoryProfileRepository()
    const manager = new UserInfoManager(repository, undefined, fixedNow)

    const [first, second] = await Promise.all([
      manager.loadProfile('u1', { displayName: 'Ana', accountReference: 'ACC-9' }),
      manager.loadProfile('u1', { displayName: 'Other' }),
    ])

    expect(first).toEqual({
      userId: 'u1',
      displayName: 'Ana',
      accountReference: 'ACC-9',
      createdAt: '2024-06-01T10:00:00.000Z',
      updatedAt: '2024-06-01T10:00:00.000Z',
    })
    expect(second).toEqual(first)
    expect(repository.profiles.size).toBe(1)
  })

  it('reads its own writes', async () => {
    const manager = new UserInfoManager(new InMemoryProfileRepository(), undefined, fixedNow)
    const profile = await manager.loadProfile('u1')

    await manager.saveProfile({ ...profile, displayName: 'Renamed' })

    await expect(manager.loadProfile('u1')).resolves.toMatchObject({ displayName: 'Renamed' })
  })

  it('merges partial updates', async () => {
    const manager = new UserInfoManager(new InMemoryProfileRepository(), undefined, fixedNow)
    await manager.loadProfile('u1', { displayName: 'Ana', accountReference: 'ACC-1' })

    const updated = await manager.updateProfile('u1', { accountReference: 'ACC-2' })

    expect(updated.displayName).toBe('Ana')
    expect(updated.accountReference).toBe('ACC-2')
  })

  it('surfaces backing store failures', async () => {
    const repository = new InMemoryProfileRepository()
    repository.failing = true
    const manager = new UserInfoManager(repository)

    await expect(manager.loadProfile('u1')).rejects.toBeInstanceOf(PersistenceError)
  })
})
