import React from 'react';
import { render } from '@testing-library/react';
import { MemoryRouter, Route, Routes } from 'react-router-dom';
import { AppStateProvider } from '../context/AppStateContext';
import type { QuestionnaireCatalog } from '../types/questions';

interface RenderOptions {
  catalog: QuestionnaireCatalog;
  route?: string;
  path?: string; // Route pattern the element is mounted under
}

// Renders `ui` inside the app state provider and a memory router.
export const renderWithState = (ui: React.ReactElement, { catalog, route = '/', path = '*' }: RenderOptions) =>
  render(
    <AppStateProvider catalog={catalog}>
      <MemoryRouter initialEntries={[route]}>
        <Routes>
          <Route path={path} element={ui} />
        </Routes>
      </MemoryRouter>
    </AppStateProvider>
  );
