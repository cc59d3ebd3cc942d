import { ResourceQueryService } from '../../../src/kubernetes/ResourceQueryService';
import { createFakeClient, fakeResolver } from '../../kubernetes/fixtures';

/**
 * A query service over an unused fake client; tests stub the methods they call
 */
export function createService(): ResourceQueryService {
  return new ResourceQueryService(fakeResolver(createFakeClient()));
}
