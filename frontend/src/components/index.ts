// Component exports
export { AppLink } from './AppLink';
export { Header } from './Header';
export { Footer } from './Footer';
export { LandingPanel } from './LandingPanel';
export { WaitingLobby } from './WaitingLobby';
export { PlayingPanel } from './PlayingPanel';
