import { BrowserRouter as Router, Route, Routes, NavLink } from 'react-router-dom';
import { useState } from 'react';
import { useTranslation } from 'react-i18next';
import PageNotFound from './NotFound';
import Questionnaire from './Questionnaire';
import Summary from './Summary';
import Import from './Import';
import ProgressOverview from './ProgressOverview';
import { AppStateProvider, useAppState } from '../context/AppStateContext';
import { TrackedButton } from './TrackedButton';
import ResetDialog from './ResetDialog';
import { hasAnswers } from '../utils/answers';
import type { QuestionnaireCatalog } from '../types/questions';

const AppContent = () => {
  const { catalog, answers } = useAppState();
  const { t } = useTranslation('common');
  const [showResetDialog, setShowResetDialog] = useState(false);

  const hasData = hasAnswers(answers);
  const pageKeys = Object.keys(catalog);

  return (
    <div className='app-layout'>
      <aside className='app-sidebar panel'>
        <ProgressOverview />
        <TrackedButton
          className='reset-btn'
          trackingName='reset_all_click'
          trackingProperties={{ has_answers: hasData }}
          onClick={() => setShowResetDialog(true)}
        >
          🔄 {t('buttons.reset')}
        </TrackedButton>
        <ResetDialog isOpen={showResetDialog} onClose={() => setShowResetDialog(false)} />
      </aside>

      <section className='app-panel panel'>
        {pageKeys.length === 0 ? (
          <p className='warning' role='alert'>
            {t('app.emptyCatalog')}
          </p>
        ) : (
          <nav>
            <NavLink to='/' end>
              {t('navigation.summary')}
            </NavLink>
            {pageKeys.map((pageKey) => (
              <NavLink key={pageKey} to={`/questionnaire/${encodeURIComponent(pageKey)}`}>
                {catalog[pageKey].info.title}
              </NavLink>
            ))}
            <NavLink to='/data'>{t('navigation.data')}</NavLink>
          </nav>
        )}
        <Routes>
          <Route path='/' element={<Summary />} />
          <Route path='/questionnaire/:pageKey' element={<Questionnaire />} />
          <Route path='/data' element={<Import />} />
          <Route path='*' element={<PageNotFound />} />
        </Routes>
      </section>
    </div>
  );
};

interface AppProps {
  catalog?: QuestionnaireCatalog;
}

const App = ({ catalog }: AppProps) => {
  return (
    <AppStateProvider catalog={catalog}>
      <Router>
        <AppContent />
      </Router>
    </AppStateProvider>
  );
};

export default App;
