export {
  type NormalizerSpec,
  type ModelType,
  type TrainerSpec,
  type ModelDescriptor,
  type ModelParts,
  buildModelDescriptor,
} from './model-descriptor.js';

export {
  MODEL_PROTO_PATH,
  getModelProtoType,
  serializeModel,
  parseModel,
} from './model-proto.js';
