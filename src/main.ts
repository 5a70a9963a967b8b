import { mountRepositorySearch } from './mount';

const container = document.getElementById('root');
if (!container) {
  throw new Error('Missing #root element');
}

mountRepositorySearch(container);
