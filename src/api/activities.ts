/**
 * Activities API
 *
 * Listing activities and roster signup/unregister
 */

import { Router } from 'express'
import { z } from 'zod'
import type { RegistryService } from '../services/registry-service'
import { ApiError } from '../middleware/error-handler'

const EmailQuerySchema = z.object({
  email: z.string().min(1)
})

function requireEmail(query: unknown): string {
  const parsed = EmailQuerySchema.safeParse(query)
  if (!parsed.success) {
    throw new ApiError(422, 'email query parameter is required', 'invalid_email')
  }
  return parsed.data.email
}

export function createActivitiesRouter(registryService: RegistryService) {
  const router = Router()

  // GET /activities - List every activity with its roster
  router.get('/', (req, res) => {
    res.json(registryService.listActivities())
  })

  // POST /activities/:activityName/signup?email= - Add a participant
  router.post('/:activityName/signup', async (req, res) => {
    const { activityName } = req.params
    const email = requireEmail(req.query)

    const message = await registryService.signup(activityName, email)

    res.json({ message })
  })

  // DELETE /activities/:activityName/unregister?email= - Remove a participant
  router.delete('/:activityName/unregister', async (req, res) => {
    const { activityName } = req.params
    const email = requireEmail(req.query)

    const message = await registryService.unregister(activityName, email)

    res.json({ message })
  })

  return router
}
