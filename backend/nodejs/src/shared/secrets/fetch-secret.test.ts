import { beforeEach, describe, expect, it, vi } from 'vitest'
import { CredentialUnavailableError } from '../errors/credential-unavailable-error.js'
import { UpstreamUnavailableError } from '../errors/upstream-unavailable-error.js'
import { fetchSecret, makeSecretFetcher } from './fetch-secret.js'

const { getSecretMock } = vi.hoisted(() => ({ getSecretMock: vi.fn() }))

vi.mock('@aws-lambda-powertools/parameters/secrets', () => ({
  getSecret: getSecretMock
}))

describe('fetchSecret', () => {
  beforeEach(() => {
    getSecretMock.mockReset()
  })

  it('returns the trimmed secret string', async () => {
    getSecretMock.mockResolvedValue('  test-secret\n')

    await expect(fetchSecret('guardian-api-key')).resolves.toBe('test-secret')
    expect(getSecretMock).toHaveBeenCalledWith('guardian-api-key', {
      maxAge: 300
    })
  })

  it('passes the cache age through', async () => {
    getSecretMock.mockResolvedValue('test-secret')

    await makeSecretFetcher({ maxAge: 60 })('guardian-api-key')

    expect(getSecretMock).toHaveBeenCalledWith('guardian-api-key', {
      maxAge: 60
    })
  })

  it('fails when the secret is missing', async () => {
    getSecretMock.mockResolvedValue(undefined)

    await expect(fetchSecret('guardian-api-key')).rejects.toBeInstanceOf(
      CredentialUnavailableError
    )
  })

  it('fails when the secret is empty', async () => {
    getSecretMock.mockResolvedValue('   ')

    await expect(fetchSecret('guardian-api-key')).rejects.toBeInstanceOf(
      CredentialUnavailableError
    )
  })

  it('fails when Secrets Manager rejects the request', async () => {
    const notFound = new Error("Secrets Manager can't find the specified secret.")
    notFound.name = 'ResourceNotFoundException'
    getSecretMock.mockRejectedValue(notFound)

    const error = await fetchSecret('guardian-api-key').catch(
      (reason: unknown) => reason
    )

    expect(error).toBeInstanceOf(CredentialUnavailableError)
    expect(error).toMatchObject({
      kind: 'CredentialUnavailable',
      message: 'API credential is unavailable'
    })
  })

  it('gives up on a lookup that outlasts the budget', async () => {
    getSecretMock.mockReturnValue(new Promise(() => undefined))

    const error = await fetchSecret('guardian-api-key', {
      signal: AbortSignal.timeout(20)
    }).catch((reason: unknown) => reason)

    expect(error).toBeInstanceOf(UpstreamUnavailableError)
    expect(error).toMatchObject({
      statusCode: 504,
      message: 'Secrets Manager did not respond within the invocation time budget'
    })
  })

  it('does not call Secrets Manager once the budget is spent', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(
      makeSecretFetcher({ maxAge: 60 })('guardian-api-key', {
        signal: controller.signal
      })
    ).rejects.toBeInstanceOf(UpstreamUnavailableError)
    expect(getSecretMock).not.toHaveBeenCalled()
  })
})
