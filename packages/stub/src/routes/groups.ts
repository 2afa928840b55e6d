import { Hono } from 'hono'
import { z } from 'zod'
import type { StoredGroup } from '../store'
import type { StubEnv } from '../context'
import { getStore, readBody } from '../context'

const createGroupSchema = z.object({
  name: z.string().min(1),
  members: z.array(z.string()),
  description: z.string().optional(),
})

/**
 * Groups routes
 */
export const groupsRoutes = new Hono<StubEnv>()

// Create group
groupsRoutes.post('/:number', async (c) => {
  const body = await readBody(c, createGroupSchema)
  if (!body) {
    return c.json({ error: 'Invalid group request' }, 400)
  }

  const group = getStore(c).createGroup(c.req.param('number'), body)
  return c.json({ id: group.id }, 201)
})

// List groups
groupsRoutes.get('/:number', (c) => {
  const groups = getStore(c).listGroups(c.req.param('number'))
  return c.json(groups.map(toWireGroup))
})

// Get group by ID
groupsRoutes.get('/:number/:groupId', (c) => {
  const group = getStore(c).getGroup(c.req.param('number'), c.req.param('groupId'))
  if (!group) {
    return c.json({ error: 'Group not found' }, 404)
  }
  return c.json(toWireGroup(group))
})

// Delete group
groupsRoutes.delete('/:number/:groupId', (c) => {
  const deleted = getStore(c).deleteGroup(c.req.param('number'), c.req.param('groupId'))
  if (!deleted) {
    return c.json({ error: 'Group not found' }, 404)
  }
  return c.body(null, 204)
})

function toWireGroup(group: StoredGroup) {
  return {
    id: group.id,
    name: group.name,
    description: group.description ?? '',
    internal_id: group.id.slice('group.'.length),
    members: group.members,
    admins: group.admins,
    pending_invites: [],
    pending_requests: [],
    blocked: false,
    invite_link: '',
  }
}
