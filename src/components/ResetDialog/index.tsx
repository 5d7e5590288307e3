import React, { useEffect, useRef } from 'react';
import { useTranslation } from 'react-i18next';
import { useAppState } from '../../context/AppStateContext';
import { TrackedButton } from '../TrackedButton';
import { backupFileName, downloadJSON } from '../../utils/exportResults';
import { trackEvent } from '../../utils/analytics';

interface ResetDialogProps {
  isOpen: boolean;
  onClose: () => void;
}

// Confirms a full reset, listing the answers that would be lost per questionnaire.
const ResetDialog: React.FC<ResetDialogProps> = ({ isOpen, onClose }) => {
  const { t } = useTranslation('common');
  const { catalog, progress, exportJSON, resetAll } = useAppState();
  const dialogRef = useRef<HTMLDialogElement>(null);

  useEffect(() => {
    const dialog = dialogRef.current;
    if (!dialog || dialog.open === isOpen) return;
    // jsdom and older browsers lack the modal API
    if (isOpen) {
      if (typeof dialog.showModal === 'function') dialog.showModal();
      else dialog.setAttribute('open', '');
    } else if (typeof dialog.close === 'function') {
      dialog.close();
    } else {
      dialog.removeAttribute('open');
    }
  }, [isOpen]);

  const answeredPages = Object.entries(progress.pages).filter(([, stats]) => stats.answered > 0);
  const { answered } = progress.overall;

  const reset = (withBackup: boolean) => {
    if (withBackup) {
      downloadJSON(exportJSON(), backupFileName(new Date()));
      trackEvent('answers_exported', { source: 'reset_dialog' });
    }
    resetAll();
    onClose();
  };

  return (
    <dialog
      ref={dialogRef}
      className='modal-content'
      aria-labelledby='reset-dialog-title'
      onCancel={(e) => {
        e.preventDefault();
        onClose();
      }}
    >
      <h3 id='reset-dialog-title'>{t('resetDialog.title')}</h3>
      {answered === 0 ? (
        <p>{t('resetDialog.nothingAnswered')}</p>
      ) : (
        <>
          <p>
            {t('resetDialog.summary', {
              answered,
              pages: answeredPages.length,
              total: Object.keys(progress.pages).length
            })}
          </p>
          <ul className='reset-pages'>
            {answeredPages.map(([pageKey, stats]) => (
              <li key={pageKey}>
                {t('resetDialog.pageLine', {
                  name: catalog[pageKey].info.title,
                  answered: stats.answered,
                  total: stats.total
                })}
              </li>
            ))}
          </ul>
          <p>
            <strong>{t('resetDialog.cannotUndo')}</strong>
          </p>
        </>
      )}
      <div className='modal-actions'>
        <button type='button' className='btn-secondary' onClick={onClose}>
          {t('buttons.cancel')}
        </button>
        {answered > 0 && (
          <TrackedButton className='btn-secondary' trackingName='export_and_reset' onClick={() => reset(true)}>
            {t('resetDialog.downloadResetButton')}
          </TrackedButton>
        )}
        <TrackedButton className='btn-danger' trackingName='confirm_reset' onClick={() => reset(false)}>
          {t('resetDialog.resetButton')}
        </TrackedButton>
      </div>
    </dialog>
  );
};

export default ResetDialog;
