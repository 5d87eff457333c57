import Fastify, { type FastifyServerOptions } from 'fastify'
import type { AppConfig } from './config/env.ts'
import { newsApiPlugin } from './plugins/news-api.plugin.ts'
import { search } from './modules/search.controller.ts'
import { renderIndexPage, renderSearchPage } from './views/search.view.ts'

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger']
  /** Replaces global fetch for upstream calls. */
  fetch?: typeof fetch
}

export async function buildApp(config: AppConfig, options: BuildAppOptions = {}) {
  const fastify = Fastify({
    logger: options.logger ?? { level: config.logLevel }
  })

  await fastify.register(newsApiPlugin, { ...config.newsApi, fetch: options.fetch })

  fastify.get('/health', function (_, reply) {
    reply.send({ status: 'ok' })
  })

  fastify.get('/', function (_, reply) {
    reply.type('text/html; charset=utf-8').send(renderIndexPage())
  })

  fastify.get('/search', async function (request, reply) {
    // Raw query in; the validator owns defaults and rejection.
    const outcome = await search(request.query, fastify.newsApi, request.log)

    if ('error' in outcome) {
      return reply
        .status(outcome.status)
        .type('text/plain; charset=utf-8')
        .send(outcome.error)
    }
    return reply.type('text/html; charset=utf-8').send(renderSearchPage(outcome.result))
  })

  return fastify
}
