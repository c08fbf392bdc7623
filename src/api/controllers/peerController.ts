import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  ExtractTriplesRequestSchema,
  TrainModelRequestSchema,
  UnloadModelRequestSchema,
} from '../../extraction/schemas';
import type { PeerService } from '../services/peerService';
import { parseInput } from '../validation';

export class PeerController {
  constructor(private peerService: PeerService) {}

  async info(_request: FastifyRequest, reply: FastifyReply) {
    reply.send(this.peerService.info());
  }

  async health(_request: FastifyRequest, reply: FastifyReply) {
    reply.send(this.peerService.health());
  }

  async listModels(_request: FastifyRequest, reply: FastifyReply) {
    reply.send(this.peerService.listModels());
  }

  async extractTriples(request: FastifyRequest, reply: FastifyReply) {
    const body = parseInput(ExtractTriplesRequestSchema, request.body, 'extraction request');
    reply.send(await this.peerService.extractTriples(body));
  }

  async trainModel(request: FastifyRequest, reply: FastifyReply) {
    const body = parseInput(TrainModelRequestSchema, request.body, 'training request');
    reply.send(await this.peerService.trainModel(body));
  }

  async unloadModel(request: FastifyRequest, reply: FastifyReply) {
    const body = parseInput(UnloadModelRequestSchema, request.body, 'unload request');
    reply.send(await this.peerService.unloadModel(body.model_profile));
  }

  async unloadAll(_request: FastifyRequest, reply: FastifyReply) {
    reply.send(await this.peerService.unloadAll());
  }
}
