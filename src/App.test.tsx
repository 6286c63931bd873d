import { render, screen } from '@testing-library/react';
import { MemoryRouter } from 'react-router-dom';
import App from './App';
import { ArticlesProvider } from './contexts/ArticlesContext';
import { createLoadCache } from './services/articlesApi';
import { csvFetch, installFetch, SMALL_CSV } from './testing/fixtures';

const renderAt = (path: string) =>
  render(
    <MemoryRouter initialEntries={[path]}>
      <ArticlesProvider source="/data/test.csv" cache={createLoadCache()}>
        <App />
      </ArticlesProvider>
    </MemoryRouter>,
  );

describe('App', () => {
  beforeEach(() => {
    installFetch(csvFetch(SMALL_CSV));
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('renders the about page with every category definition', () => {
    renderAt('/about');

    expect(screen.getByRole('heading', { name: 'About the Data' })).toBeInTheDocument();
    expect(screen.getByText('Organization')).toBeInTheDocument();
    expect(screen.getByText('Bulgarian (bg)')).toBeInTheDocument();
  });

  it('redirects unknown routes to the analysis page', async () => {
    renderAt('/nowhere');

    expect(
      await screen.findByRole('heading', { name: 'Climate Change Article Types Across Wikipedia Languages' }),
    ).toBeInTheDocument();
  });

  it('links both pages from the sidebar', () => {
    renderAt('/about');

    expect(screen.getByRole('link', { name: 'Category Analysis' })).toHaveAttribute('href', '/analysis');
    expect(screen.getByRole('link', { name: 'About the Data' })).toHaveAttribute('href', '/about');
  });
});
