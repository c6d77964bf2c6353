import mysql from 'mysql2/promise';
import { config } from './config';

const pool = mysql.createPool({
  ...config.mysql,
  waitForConnections: true,
  keepAliveInitialDelay: 0,
  // fechas como 'YYYY-MM-DD' y SUM(...) como number
  dateStrings: true,
  decimalNumbers: true,
});

export default pool;
