export { JwtAuthGuard } from './jwt-auth.guard';
