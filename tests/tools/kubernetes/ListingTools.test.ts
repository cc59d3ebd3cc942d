import {
  GetDeploymentsTool,
  GetNamespacesTool,
  GetNodesTool,
  GetServicesTool,
} from '../../../src/tools/kubernetes';
import type { ResourceQueryService } from '../../../src/kubernetes/ResourceQueryService';
import { CONFIG_INFO } from '../../kubernetes/fixtures';
import { createService } from './helpers';

describe('cluster listing tools', () => {
  let service: ResourceQueryService;

  beforeEach(() => {
    service = createService();
  });

  it('get_nodes should list nodes with the requested timeout', async () => {
    const listNodes = jest
      .spyOn(service, 'listNodes')
      .mockResolvedValue({ status: 'success', config_info: CONFIG_INFO, node_count: 0, nodes: [] });

    const result = await new GetNodesTool().execute({ timeoutMs: 100 }, service);

    expect(listNodes).toHaveBeenCalledWith({ timeoutMs: 100 });
    expect(result).toEqual({ status: 'success', config_info: CONFIG_INFO, node_count: 0, nodes: [] });
  });

  it('get_namespaces should accept missing arguments', async () => {
    const listNamespaces = jest.spyOn(service, 'listNamespaces').mockResolvedValue({
      status: 'success',
      config_info: CONFIG_INFO,
      namespace_count: 0,
      namespaces: [],
    });

    await new GetNamespacesTool().execute(undefined, service);

    expect(listNamespaces).toHaveBeenCalledWith({ timeoutMs: undefined });
  });

  it('get_services should default to all namespaces', async () => {
    const listServices = jest.spyOn(service, 'listServices').mockResolvedValue({
      status: 'success',
      config_info: CONFIG_INFO,
      service_count: 0,
      services: [],
    });

    await new GetServicesTool().execute({}, service);
    await new GetServicesTool().execute({ namespace: 'kube-system' }, service);

    expect(listServices).toHaveBeenNthCalledWith(1, 'all', { timeoutMs: undefined });
    expect(listServices).toHaveBeenNthCalledWith(2, 'kube-system', { timeoutMs: undefined });
  });

  it('get_deployments should reject an empty namespace', async () => {
    const listDeployments = jest.spyOn(service, 'listDeployments');

    const result = await new GetDeploymentsTool().execute({ namespace: '' }, service);

    expect(result).toEqual({
      status: 'error',
      error_message:
        'Invalid arguments for get_deployments: namespace: String must contain at least 1 character(s)',
    });
    expect(listDeployments).not.toHaveBeenCalled();
  });

  it('get_deployments should pass the namespace through', async () => {
    const listDeployments = jest.spyOn(service, 'listDeployments').mockResolvedValue({
      status: 'error',
      error_message: 'Error listing deployments: socket hang up',
    });

    const result = await new GetDeploymentsTool().execute({ namespace: 'shop' }, service);

    expect(listDeployments).toHaveBeenCalledWith('shop', { timeoutMs: undefined });
    expect(result.status).toBe('error');
  });
});
