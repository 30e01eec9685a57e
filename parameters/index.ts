import './dev-params';
import './prd-params';
