export {
  EnrollmentProvisioner,
  EnterpriseEnrollmentClient,
  ENROLLMENT_PATH,
  createEnrollmentHttpClient,
} from './enrollment.client';
