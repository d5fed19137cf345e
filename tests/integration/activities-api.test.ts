/**
 * Activities API Integration Tests
 *
 * Drives the Express app in process through supertest
 */

import { describe, it, expect, beforeEach } from 'vitest'
import request from 'supertest'
import type { Express } from 'express'
import { createApp } from '../../src/app'
import { loadConfig } from '../../src/config'

const activityPath = (name: string, action: 'signup' | 'unregister', email: string) =>
  `/activities/${encodeURIComponent(name)}/${action}?email=${encodeURIComponent(email)}`

let app: Express

beforeEach(() => {
  ;({ app } = createApp({ config: loadConfig({ NODE_ENV: 'test' }) }))
})

async function participantsOf(activity: string): Promise<string[]> {
  const response = await request(app).get('/activities').expect(200)
  return response.body[activity].participants
}

describe('Root & service endpoints', () => {
  it('GET / redirects to the static front end', async () => {
    const response = await request(app).get('/')

    expect(response.status).toBe(307)
    expect(response.headers.location).toBe('/static/index.html')
  })

  it('GET /static/index.html serves the front end', async () => {
    const response = await request(app).get('/static/index.html').expect(200)

    expect(response.headers['content-type']).toContain('text/html')
    expect(response.text).toContain('<title>Mergington High School Activities</title>')
  })

  it('GET /health reports status and activity count', async () => {
    const response = await request(app).get('/health').expect(200)

    expect(response.body).toMatchObject({
      status: 'ok',
      version: expect.any(String),
      env: 'test',
      activities: 9
    })
  })

  it('GET /docs lists the endpoints', async () => {
    const response = await request(app).get('/docs').expect(200)

    expect(response.body.endpoints.signup).toBe('POST /activities/{activityName}/signup?email={email}')
  })

  it('unknown routes return 404', async () => {
    const response = await request(app).get('/nowhere').expect(404)

    expect(response.body).toEqual({ detail: 'Not found', code: 'not_found', path: '/nowhere' })
  })
})

describe('GET /activities', () => {
  it('returns all activities', async () => {
    const response = await request(app).get('/activities').expect(200)

    expect(Object.keys(response.body)).toHaveLength(9)
    expect(response.body).toHaveProperty(['Chess Club'])
    expect(response.body).toHaveProperty(['Soccer Team'])
    expect(response.body).toHaveProperty(['Programming Class'])
  })

  it('returns well-typed activity records', async () => {
    const response = await request(app).get('/activities').expect(200)

    for (const details of Object.values<Record<string, unknown>>(response.body)) {
      expect(Object.keys(details).sort()).toEqual(['description', 'max_participants', 'participants', 'schedule'])
      expect(typeof details.description).toBe('string')
      expect(typeof details.schedule).toBe('string')
      expect(Number.isInteger(details.max_participants)).toBe(true)
      expect(Array.isArray(details.participants)).toBe(true)
    }
  })
})

describe('POST /activities/:activityName/signup', () => {
  it('signs up a new student', async () => {
    const before = await participantsOf('Chess Club')

    const response = await request(app)
      .post(activityPath('Chess Club', 'signup', 'newstudent@mergington.edu'))
      .expect(200)

    expect(response.body).toEqual({ message: 'Signed up newstudent@mergington.edu for Chess Club' })
    expect(await participantsOf('Chess Club')).toEqual([...before, 'newstudent@mergington.edu'])
  })

  it('rejects a duplicate signup', async () => {
    const response = await request(app)
      .post(activityPath('Chess Club', 'signup', 'michael@mergington.edu'))
      .expect(400)

    expect(response.body.detail.toLowerCase()).toContain('already signed up')
    expect(response.body.code).toBe('already_registered')
    expect(await participantsOf('Chess Club')).toEqual(['michael@mergington.edu', 'daniel@mergington.edu'])
  })

  it('rejects an unknown activity', async () => {
    const response = await request(app)
      .post(activityPath('Nonexistent Activity', 'signup', 'student@mergington.edu'))
      .expect(404)

    expect(response.body).toEqual({ detail: 'Activity not found', code: 'activity_not_found' })
  })

  it('decodes URL-encoded activity names', async () => {
    await request(app)
      .post('/activities/Art%20Workshop/signup?email=newstudent@mergington.edu')
      .expect(200)

    expect(await participantsOf('Art Workshop')).toContain('newstudent@mergington.edu')
  })

  it('requires the email query parameter', async () => {
    const response = await request(app).post('/activities/Chess%20Club/signup').expect(422)

    expect(response.body).toEqual({ detail: 'email query parameter is required', code: 'invalid_email' })
  })

  it('lets one student join several activities', async () => {
    const email = 'multisport@mergington.edu'
    const activities = ['Chess Club', 'Soccer Team', 'Drama Club']

    for (const activity of activities) {
      await request(app).post(activityPath(activity, 'signup', email)).expect(200)
    }

    for (const activity of activities) {
      expect(await participantsOf(activity)).toContain(email)
    }
  })
})

describe('DELETE /activities/:activityName/unregister', () => {
  it('unregisters a participant', async () => {
    const response = await request(app)
      .delete(activityPath('Chess Club', 'unregister', 'michael@mergington.edu'))
      .expect(200)

    expect(response.body).toEqual({ message: 'Unregistered michael@mergington.edu from Chess Club' })
    expect(await participantsOf('Chess Club')).toEqual(['daniel@mergington.edu'])
  })

  it('rejects a student who is not signed up', async () => {
    const response = await request(app)
      .delete(activityPath('Chess Club', 'unregister', 'notregistered@mergington.edu'))
      .expect(400)

    expect(response.body.detail.toLowerCase()).toContain('not signed up')
    expect(response.body.code).toBe('not_registered')
  })

  it('rejects an unknown activity', async () => {
    const response = await request(app)
      .delete(activityPath('Nonexistent Activity', 'unregister', 'student@mergington.edu'))
      .expect(404)

    expect(response.body.detail.toLowerCase()).toContain('not found')
  })

  it('decodes URL-encoded activity names', async () => {
    await request(app)
      .delete('/activities/Art%20Workshop/unregister?email=mia@mergington.edu')
      .expect(200)

    expect(await participantsOf('Art Workshop')).not.toContain('mia@mergington.edu')
  })
})

describe('Workflows', () => {
  it('signup then unregister restores the roster', async () => {
    const before = await participantsOf('Drama Club')

    await request(app).post(activityPath('Drama Club', 'signup', 'testworkflow@mergington.edu')).expect(200)
    expect(await participantsOf('Drama Club')).toHaveLength(before.length + 1)

    await request(app).delete(activityPath('Drama Club', 'unregister', 'testworkflow@mergington.edu')).expect(200)
    expect(await participantsOf('Drama Club')).toEqual(before)
  })

  it('concurrent duplicate signups admit exactly one', async () => {
    const path = activityPath('Math Club', 'signup', 'race@mergington.edu')
    const statuses = await Promise.all([
      request(app).post(path).then((r) => r.status),
      request(app).post(path).then((r) => r.status)
    ])

    expect(statuses.sort()).toEqual([200, 400])
    expect((await participantsOf('Math Club')).filter((p) => p === 'race@mergington.edu')).toHaveLength(1)
  })

  it('serves an injected catalog instead of the seed file', async () => {
    const { app: custom } = createApp({
      config: loadConfig({ NODE_ENV: 'test' }),
      catalog: {
        Robotics: { description: 'Build robots', schedule: 'Mondays', max_participants: 8, participants: [] }
      }
    })

    const response = await request(custom).get('/activities').expect(200)

    expect(response.body).toEqual({
      Robotics: { description: 'Build robots', schedule: 'Mondays', max_participants: 8, participants: [] }
    })
  })

  it('each app owns its registry', async () => {
    const other = createApp({ config: loadConfig({ NODE_ENV: 'test' }) })

    await request(app).post(activityPath('Gym Class', 'signup', 'isolated@mergington.edu')).expect(200)

    expect(other.registryService.getActivity('Gym Class').participants).not.toContain('isolated@mergington.edu')
  })
})

describe('Rate limiting', () => {
  it('answers 429 once the window budget is spent', async () => {
    const { app: limited } = createApp({
      config: loadConfig({ NODE_ENV: 'test', RATE_LIMIT_MAX_REQUESTS: '2' })
    })

    await request(limited).get('/activities').expect(200)
    await request(limited).get('/activities').expect(200)
    const response = await request(limited).get('/activities').expect(429)

    expect(response.body.code).toBe('rate_limited')
  })
})
