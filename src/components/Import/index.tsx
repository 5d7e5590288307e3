import { useState, useRef, type ChangeEvent } from 'react';
import { useTranslation } from 'react-i18next';
import { useNavigate } from 'react-router-dom';
import { useAppState } from '../../context/AppStateContext';
import { TrackedButton } from '../TrackedButton';
import { backupFileName, downloadJSON } from '../../utils/exportResults';
import { trackEvent } from '../../utils/analytics';
import { hasAnswers } from '../../utils/answers';
import { MAX_IMPORT_BYTES } from '../../utils/importValidation';
import Footer from '../Footer';
import { Toast, type ToastType } from '../Toast';

interface ToastState {
  message: string;
  type: ToastType;
}

const Import = () => {
  const { t } = useTranslation('common');
  const navigate = useNavigate();
  const { answers, exportJSON, importJSON } = useAppState();
  const [raw, setRaw] = useState('');
  const [toast, setToast] = useState<ToastState | null>(null);
  const fileInputRef = useRef<HTMLInputElement>(null);

  const showToast = (message: string, type: ToastType) => {
    setToast({ message, type });
  };

  const onExport = () => {
    downloadJSON(exportJSON(), backupFileName(new Date()));
    trackEvent('answers_exported', { source: 'data_page' });
  };

  const runImport = (json: string, successMessage: string) => {
    const result = importJSON(json);
    showToast(
      result.success ? successMessage : `${t('import.errorInvalidJSON')} ${result.error ?? ''}`,
      result.success ? 'success' : 'error'
    );

    // Back to the summary after a successful import
    if (result.success) {
      setTimeout(() => navigate('/'), 1500);
    }
  };

  const handleFileUpload = (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (!file) return;

    if (!file.name.endsWith('.json')) {
      showToast(t('import.errorFileType'), 'error');
      return;
    }

    if (file.size > MAX_IMPORT_BYTES) {
      showToast(t('import.errorFileSize'), 'error');
      return;
    }

    const reader = new FileReader();
    reader.onload = () => {
      if (typeof reader.result !== 'string') {
        showToast(t('import.errorFileRead'), 'error');
        return;
      }
      setRaw(reader.result);
      runImport(reader.result, t('import.successFileImport'));
    };
    reader.onerror = () => {
      showToast(t('import.errorFileRead'), 'error');
    };
    reader.readAsText(file);

    if (fileInputRef.current) {
      fileInputRef.current.value = '';
    }
  };

  return (
    <div className='panel'>
      <h2>{t('import.exportTitle')}</h2>
      <p>{t('import.exportDescription')}</p>
      <div className='actions'>
        <TrackedButton trackingName='download_backup' onClick={onExport} disabled={!hasAnswers(answers)}>
          {t('buttons.exportJSON')}
        </TrackedButton>
      </div>

      <h2>{t('import.title')}</h2>
      <p>{t('import.description')}</p>

      <div className='import-methods'>
        <div className='file-upload'>
          <TrackedButton trackingName='upload_json_file' onClick={() => fileInputRef.current?.click()}>
            {t('import.uploadFile')}
          </TrackedButton>
          <input
            ref={fileInputRef}
            id='file-input'
            type='file'
            accept='.json,application/json'
            onChange={handleFileUpload}
            className='hidden-file-input'
            aria-label={t('import.uploadFile')}
          />
        </div>

        <p className='import-divider'>{t('import.or')}</p>

        <textarea
          rows={8}
          placeholder={t('import.pasteJSON')}
          aria-label={t('import.pasteJSON')}
          value={raw}
          onChange={(e) => setRaw(e.target.value)}
        />
        <div className='actions'>
          <TrackedButton trackingName='import_json' onClick={() => runImport(raw, t('import.successImport'))}>
            {t('buttons.import')}
          </TrackedButton>
        </div>
      </div>

      {toast && <Toast message={toast.message} type={toast.type} onClose={() => setToast(null)} />}
      <Footer />
    </div>
  );
};

export default Import;
