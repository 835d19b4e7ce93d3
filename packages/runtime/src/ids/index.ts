export {
  SnowflakeGenerator,
  createSnowflakeGenerator,
  type Clock,
  type IdGenerator,
  type SnowflakeGeneratorOptions,
} from './generator.js';
