/**
 * Jest Setup File
 *
 * Environment defaults for all tests. Nothing in the test suite talks to a
 * real Terraform API: clients get an in-process fake fetch.
 */

process.env.TFVE_ORGANIZATION_NAME = 'test-org'
process.env.TFVE_TOKEN = 'test-token'

// Keep test output quiet unless a test lowers the level itself
process.env.LOG_LEVEL = 'error'
