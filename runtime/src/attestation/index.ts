export {
  InMemoryAttestationRegistry,
  type SourceAttestation,
  type AttestationValidity,
} from './attestation.js';
