import { RequestHandler } from 'express'
import { ZodTypeAny } from 'zod'
import type { DocumentStore } from '../store/documentStore'
import { createScoped, deleteScoped, listScoped, parseLimit, updateScoped, validatePayload } from '../services/tenantCrud'
import { sendError } from '../utils/errors'
import { decodeId } from '../utils/objectId'
import { tenantOf } from '../utils/tenant'

export const listHandler = (store: DocumentStore, collection: string, defaultLimit?: number): RequestHandler =>
  async (req, res) => {
    try {
      const tenantId = tenantOf(req)
      const limit = parseLimit(req.query.limit, defaultLimit)
      res.json(await listScoped(store, collection, tenantId, limit))
    } catch (err) {
      sendError(res, err)
    }
  }

export const createHandler = (store: DocumentStore, collection: string, schema: ZodTypeAny, message: string): RequestHandler =>
  async (req, res) => {
    try {
      const tenantId = tenantOf(req)
      const payload = validatePayload(schema, req.body)
      const id = await createScoped(store, collection, tenantId, payload)
      res.json({ id, message })
    } catch (err) {
      sendError(res, err)
    }
  }

export const updateHandler = (store: DocumentStore, collection: string, schema: ZodTypeAny): RequestHandler =>
  async (req, res) => {
    try {
      const tenantId = tenantOf(req)
      const id = decodeId(req.params.id)
      const patch = validatePayload(schema, req.body)
      await updateScoped(store, collection, tenantId, id, patch)
      res.json({ id: req.params.id, updated: true })
    } catch (err) {
      sendError(res, err)
    }
  }

export const deleteHandler = (store: DocumentStore, collection: string): RequestHandler =>
  async (req, res) => {
    try {
      const tenantId = tenantOf(req)
      const id = decodeId(req.params.id)
      await deleteScoped(store, collection, tenantId, id)
      res.json({ id: req.params.id, deleted: true })
    } catch (err) {
      sendError(res, err)
    }
  }
