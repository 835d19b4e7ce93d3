export {
  S3StorageSigner,
  createS3StorageSigner,
  storageKeyFor,
  type SignRequest,
  type SignedRequest,
  type StorageSigner,
} from './signer.js';
