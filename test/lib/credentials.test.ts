import { expect } from 'chai'
import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import {
  CredentialsManager,
  getMissingProfileMessage,
  maskToken,
  normalizeHost,
} from '../../src/lib/credentials.js'
import { logger } from '../../src/lib/logger.js'

describe('lib/credentials', () => {
  let tempDir: string
  let path: string
  const originalProfile = process.env.LAKEOPS_PROFILE

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'lakeops-credentials-test-'))
    path = join(tempDir, 'credentials.yaml')
    delete process.env.LAKEOPS_PROFILE
  })

  afterEach(() => {
    rmSync(tempDir, { force: true, recursive: true })
    if (originalProfile === undefined) {
      delete process.env.LAKEOPS_PROFILE
    } else {
      process.env.LAKEOPS_PROFILE = originalProfile
    }
  })

  describe('CredentialsManager.load', () => {
    it('returns an empty manager when the file does not exist', () => {
      const manager = CredentialsManager.load(path)
      expect(manager.listNames()).to.deep.equal([])
      expect(manager.getDefault()).to.equal(undefined)
    })

    it('reads profiles and the default', () => {
      writeFileSync(path, [
        'default: dev',
        'profiles:',
        '  dev:',
        '    host: https://dev.test',
        '    token: test-dev-token',
        '  prod:',
        '    host: https://prod.test',
        '    token: test-prod-token',
        '    account_id: acc-1',
        '    account_host: https://accounts.test',
      ].join('\n'))

      const manager = CredentialsManager.load(path)

      expect(manager.listNames()).to.deep.equal(['dev', 'prod'])
      expect(manager.getDefault()).to.equal('dev')
      expect(manager.get('prod')).to.deep.equal({
        accountHost: 'https://accounts.test',
        accountId: 'acc-1',
        host: 'https://prod.test',
        name: 'prod',
        token: 'test-prod-token',
      })
    })

    it('ignores a file with the wrong structure', () => {
      writeFileSync(path, 'profiles:\n  dev:\n    host: https://dev.test\n')
      const warnings: unknown[][] = []
      const restore = logger.setWriters({ err: (...args) => warnings.push(args) })

      const manager = CredentialsManager.load(path)
      restore()

      expect(manager.listNames()).to.deep.equal([])
      expect(warnings).to.have.length(1)
      expect(String(warnings[0][1])).to.contain(`Ignoring invalid credentials file ${path}`)
    })
  })

  describe('resolve', () => {
    function manager(): CredentialsManager {
      const credentials = CredentialsManager.load(path)
      credentials.add({ host: 'https://dev.test', name: 'dev', token: 'test-dev-token' })
      credentials.add({ host: 'https://prod.test', name: 'prod', token: 'test-prod-token' })
      credentials.setDefault('dev')
      return credentials
    }

    it('prefers the explicit name', () => {
      process.env.LAKEOPS_PROFILE = 'dev'
      expect(manager().resolve('prod')?.host).to.equal('https://prod.test')
    })

    it('falls back to LAKEOPS_PROFILE, then the default', () => {
      expect(manager().resolve()?.name).to.equal('dev')
      process.env.LAKEOPS_PROFILE = 'prod'
      expect(manager().resolve()?.name).to.equal('prod')
    })

    it('returns undefined for an unknown profile', () => {
      expect(manager().resolve('staging')).to.equal(undefined)
    })
  })

  describe('save', () => {
    it('writes a file that loads back, readable only by the owner', () => {
      const credentials = CredentialsManager.load(path)
      credentials.add({ accountId: 'acc-1', host: 'https://dev.test', name: 'dev', token: 'test-dev-token' })
      credentials.setDefault('dev')
      credentials.save()

      expect(statSync(path).mode & 0o777).to.equal(0o600)
      expect(readFileSync(path, 'utf8')).to.contain('account_id: acc-1')

      const reloaded = CredentialsManager.load(path)
      expect(reloaded.getDefault()).to.equal('dev')
      expect(reloaded.get('dev')).to.deep.equal({
        accountHost: undefined,
        accountId: 'acc-1',
        host: 'https://dev.test',
        name: 'dev',
        token: 'test-dev-token',
      })
    })

    it('clears the default when its profile is removed', () => {
      const credentials = CredentialsManager.load(path)
      credentials.add({ host: 'https://dev.test', name: 'dev', token: 'test-dev-token' })
      credentials.setDefault('dev')

      expect(credentials.remove('dev')).to.equal(true)
      expect(credentials.getDefault()).to.equal(undefined)
    })

    it('refuses an unknown default', () => {
      expect(() => CredentialsManager.load(path).setDefault('ghost')).to.throw('Profile "ghost" not found')
    })
  })

  describe('getMissingProfileMessage', () => {
    it('names the requested profile and lists the available ones', () => {
      const credentials = CredentialsManager.load(path)
      credentials.add({ host: 'https://dev.test', name: 'dev', token: 'test-dev-token' })

      const lines = getMissingProfileMessage(credentials, 'prod').split('\n')

      expect(lines.slice(0, 4)).to.deep.equal(['No credentials for profile "prod"', '', 'Available profiles:', '  - dev'])
    })

    it('explains that nothing selected a profile', () => {
      const message = getMissingProfileMessage(CredentialsManager.load(path))
      expect(message.split('\n')[0]).to.equal('No credentials configured: no --profile given, LAKEOPS_PROFILE unset and no default profile')
    })
  })

  describe('normalizeHost', () => {
    it('keeps only the https origin', () => {
      expect(normalizeHost('https://dbc-1234.cloud.example.com/some/path?o=1')).to.equal('https://dbc-1234.cloud.example.com')
    })

    it('rejects other schemes and garbage', () => {
      expect(normalizeHost('http://plain.test')).to.equal(undefined)
      expect(normalizeHost('not a url')).to.equal(undefined)
    })
  })

  describe('maskToken', () => {
    it('hides short tokens entirely', () => {
      expect(maskToken('short')).to.equal('***')
    })

    it('keeps three characters at each end', () => {
      expect(maskToken('test-secret-token')).to.equal('tes...ken')
    })
  })
})
