import cors from 'cors';
import express from 'express';
import multer from 'multer';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { ConfigurationError, StatementParseError } from './domain/errors/StatementErrors.js';

const container = new AppContainer();
const app = express();
const port = container.config.server.port;

const csvMimeTypes = new Set(['text/csv', 'application/csv', 'application/vnd.ms-excel', 'text/plain']);

// Exports are small, keep them in memory
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 10 * 1024 * 1024, // 10MB max
  },
  fileFilter: (req, file, cb) => {
    if (csvMimeTypes.has(file.mimetype) || file.originalname.toLowerCase().endsWith('.csv')) {
      cb(null, true);
    } else {
      cb(new Error('Only CSV exports are allowed'));
    }
  },
});

app.use(cors({ origin: '*', credentials: false }));

app.get('/api/health', (req, res) => {
  res.json({
    name: 'Sparda-Bank Statement Import API',
    version: '0.1.0',
    bankConfigured: container.hasBankConfigured(),
  });
});

app.post('/api/statements', upload.single('statement'), async (req, res) => {
  try {
    if (!req.file) {
      return res.status(400).json({
        success: false,
        error: 'No CSV file provided. Please upload a statement export.',
      });
    }

    const parser = container.plugin.createStatementParser();
    const statement = await parser.parse(req.file.buffer, { fileName: req.file.originalname });

    return res.json({ success: true, statement });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return res.status(503).json({ success: false, error: error.message });
    }

    if (error instanceof StatementParseError) {
      return res.status(400).json({ success: false, error: error.message });
    }

    console.error('Statement import error:', error);
    const message = error instanceof Error ? error.message : 'Unable to import statement';
    return res.status(500).json({ success: false, error: message });
  }
});

app.all('/api/*', (req, res) => {
  res.status(404).json({ success: false, error: 'API endpoint not found' });
});

app.listen(port, () => {
  console.log(`🚀 Statement import API listening on port ${port}`);
  console.log(`🏦 Bank configured: ${container.hasBankConfigured()}`);
});
