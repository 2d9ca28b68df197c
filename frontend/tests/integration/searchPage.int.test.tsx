/**
 * SearchPage integration tests
 *
 * These tests cover the full search flow:
 * - local validation before any request
 * - success and error banners
 * - topic filtering and grouping of results
 *
 * Only the gateway call is mocked; the page, form, hooks
 * and classifier are real.
 */

// mocks must be hoisted before imports
jest.mock('@/api/gateway', () => ({
  searchArticles: jest.fn(),
}));

// ---- imports AFTER mocks ----

import { fireEvent, render, screen, within } from '@testing-library/react';
import SearchPage from '@/pages/search';
import { searchArticles } from '@/api/gateway';
import { healthArticles } from '../fixtures/articles';

const mockedSearch = jest.mocked(searchArticles);

const submit = () => fireEvent.click(screen.getByRole('button', { name: '🔍 Search' }));

describe('SearchPage (integration)', () => {
  it('blocks an empty query locally', () => {
    render(<SearchPage />);

    fireEvent.change(screen.getByLabelText('Keyword Query'), { target: { value: '  ' } });
    submit();

    expect(screen.getByRole('alert')).toHaveTextContent('Please enter a search query.');
    expect(mockedSearch).not.toHaveBeenCalled();
  });

  it('blocks a reversed date range locally', () => {
    render(<SearchPage />);

    fireEvent.change(screen.getByLabelText('From'), { target: { value: '2024-02-01' } });
    fireEvent.change(screen.getByLabelText('To'), { target: { value: '2024-01-01' } });
    submit();

    expect(screen.getByRole('alert')).toHaveTextContent(
      'The start date must not be after the end date.'
    );
    expect(mockedSearch).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * A successful search shows the formatted total, the range and
   * every article; topic buttons and grouping then reshape the list.
   */
  it('shows results and filters them by topic', async () => {
    mockedSearch.mockResolvedValue({ kind: 'success', totalResults: 1234, articles: healthArticles });

    render(<SearchPage />);

    fireEvent.change(screen.getByLabelText('Keyword Query'), { target: { value: 'telehealth' } });
    fireEvent.change(screen.getByLabelText('From'), { target: { value: '2024-01-01' } });
    fireEvent.change(screen.getByLabelText('To'), { target: { value: '2024-01-07' } });
    fireEvent.change(screen.getByLabelText('Domains Filter (optional)'), {
      target: { value: ' reuters.com ' },
    });
    submit();

    expect(await screen.findByText('Total Results Found: 1,234')).toBeInTheDocument();
    expect(screen.getByText('Showing 5 article(s)')).toBeInTheDocument();
    expect(mockedSearch).toHaveBeenCalledWith('http://localhost:8000', {
      q: 'telehealth',
      from: '2024-01-01',
      to: '2024-01-07',
      limit: 20,
      domains: 'reuters.com',
    });

    fireEvent.click(screen.getByRole('button', { name: 'Mental Health' }));

    expect(screen.getByRole('button', { name: 'Mental Health' })).toHaveAttribute('aria-pressed', 'true');
    expect(screen.queryByText('1. New AI tool helps rural hospitals')).toBeNull();
    expect(screen.getByText('1. Senate passes mental health bill')).toBeInTheDocument();

    fireEvent.click(screen.getByLabelText('Group by topic'));

    const section = screen.getByRole('region', { name: 'Mental Health' });
    expect(within(section).getByText('Mental Health (1)')).toBeInTheDocument();
  });

  it('says so when the search finds nothing', async () => {
    mockedSearch.mockResolvedValue({ kind: 'success', totalResults: 0, articles: [] });

    render(<SearchPage />);
    submit();

    expect(
      await screen.findByText('No articles found for this query and date range.')
    ).toBeInTheDocument();
  });

  it('shows a gateway error in the alert banner', async () => {
    mockedSearch.mockResolvedValue({
      kind: 'error',
      message: 'API Error: Invalid from date format: 2024-02-30. Expected YYYY-MM-DD.',
    });

    render(<SearchPage />);
    submit();

    expect(await screen.findByRole('alert')).toHaveTextContent(
      'API Error: Invalid from date format: 2024-02-30. Expected YYYY-MM-DD.'
    );
  });

  it('uses and remembers the backend URL from the sidebar', async () => {
    localStorage.setItem('gatewayUrl', JSON.stringify('http://gateway.test:9000/'));
    mockedSearch.mockResolvedValue({ kind: 'success', totalResults: 0, articles: [] });

    render(<SearchPage />);

    expect(screen.getByLabelText('Backend URL')).toHaveValue('http://gateway.test:9000/');

    fireEvent.change(screen.getByLabelText('Backend URL'), {
      target: { value: 'http://gateway.test:9001' },
    });
    submit();

    await screen.findByText('No articles found for this query and date range.');
    expect(mockedSearch).toHaveBeenCalledWith('http://gateway.test:9001', expect.any(Object));
    expect(localStorage.getItem('gatewayUrl')).toBe('"http://gateway.test:9001"');
  });
});
